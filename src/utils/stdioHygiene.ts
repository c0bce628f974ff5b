/**
 * In server mode stdout carries JSON-RPC frames, so stray console output
 * would corrupt the stream. Route the stdout-bound console methods to stderr.
 */

function routeToStderr(...args: unknown[]): void {
  console.error(...args);
}

export function routeConsoleToStderr(): void {
  if (console.log !== routeToStderr) console.log = routeToStderr;
  if (console.info !== routeToStderr) console.info = routeToStderr;
  if (console.debug !== routeToStderr) console.debug = routeToStderr;
}
