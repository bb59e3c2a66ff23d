/**
 * stdout carries JSON-RPC when serving MCP and labels when running `render`;
 * diagnostics must never land there. Console log-like methods are sent to
 * stderr once the server starts.
 */

type ConsoleMethod = 'log' | 'info' | 'debug';

const REROUTED: readonly ConsoleMethod[] = ['log', 'info', 'debug'];

function routeToStderr(...args: unknown[]): void {
  console.error(...args);
}

export function routeConsoleToStderr(target: Console = console): void {
  for (const method of REROUTED) {
    if (target[method] !== routeToStderr) target[method] = routeToStderr;
  }
}

export function logPrefix(): string {
  return '[pdr-lines]';
}
