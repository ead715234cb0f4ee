/**
 * Plain-text report for search results
 */

export const NO_RESULTS_MESSAGE = 'No results found.';
export const RESULTS_HEADER = 'Search results:';

export function formatResults(results: readonly string[]): string {
  if (results.length === 0) {
    return NO_RESULTS_MESSAGE;
  }
  return [RESULTS_HEADER, ...results.map(url => `- ${url}`)].join('\n');
}

/**
 * Write the report, newline-terminated, to a stream (stdout by default)
 */
export function printResults(results: readonly string[], stream: NodeJS.WritableStream = process.stdout): void {
  stream.write(`${formatResults(results)}\n`);
}
