/** Text shown for a fault that escaped the engine's tagged failures. */
export function fatalMessage(reason: unknown): string {
  if (reason instanceof Error) return reason.stack ?? `${reason.name}: ${reason.message}`;
  if (typeof reason === 'string') return reason;
  return `Unexpected fault: ${String(reason)}`;
}

export const FATAL_TITLE = 'The strength calculator stopped unexpectedly';
export const FATAL_HINT =
  'No result was produced for the entered joint. Reload the page and enter the data again; ' +
  'if the fault repeats, note the details below.';
