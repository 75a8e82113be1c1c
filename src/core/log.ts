// src/core/log.ts
// Lightweight logging: offer each message to the host first, fall back to the console.

export type LogLevel = 'info' | 'warn';

/** Host hook (status bar, diagnostics pane). Return true when the message was handled. */
export type LogSink = (level: LogLevel, message: string) => boolean;

let sink: LogSink | null = null;

export function setLogSink(next: LogSink | null): void {
  sink = next;
}

function postToHost(level: LogLevel, msg: string): boolean {
  return sink ? sink(level, msg) : false;
}

export function logInfo(msg: string): void {
  if (postToHost('info', msg)) return;
  globalThis.console?.log?.(msg);
}

export function logWarn(msg: string): void {
  const payload = 'Warning: ' + msg;
  if (postToHost('warn', payload)) return;
  globalThis.console?.warn?.(payload);
}
