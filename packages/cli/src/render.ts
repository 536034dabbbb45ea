import type { CLIErrorView } from '@taskpipe/core';

const RED_BOLD = '\u001B[1;31m';
const DIM = '\u001B[2m';
const RESET = '\u001B[0m';

/**
 * Text block for an error that escaped the pipeline. Detail lines are
 * indented under the title; long values are left to the terminal to wrap.
 */
export function renderCLIView(view: CLIErrorView): string {
  const paint = (text: string, style: string): string =>
    view.colors ? `${style}${text}${RESET}` : text;

  const details = [
    view.location,
    view.excerpt === undefined ? undefined : `Value: ${view.excerpt}`,
    view.cause === undefined ? undefined : paint(`Cause: ${view.cause}`, DIM),
  ].filter((line): line is string => line !== undefined);

  return [paint(`✖ ${view.title}`, RED_BOLD), ...details.map((line) => `  ${line}`)].join(
    '\n'
  );
}
