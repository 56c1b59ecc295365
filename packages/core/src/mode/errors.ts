/**
 * Error description for values thrown by mode code.
 *
 * Mode scripts run in their own `node:vm` context, so what they throw is an
 * `Error` from another realm (or not an Error at all) and `instanceof Error`
 * cannot be trusted. Fields are read structurally instead.
 */

export interface ErrorDescription {
  readonly message: string;
  /** Full trace when one is available, otherwise `name: message`. */
  readonly stack: string;
}

export function describeError(err: unknown): ErrorDescription {
  if (typeof err === "object" && err !== null) {
    const message = "message" in err && typeof err.message === "string" ? err.message : String(err);
    const name = "name" in err && typeof err.name === "string" ? err.name : "Error";
    const stack = "stack" in err && typeof err.stack === "string" ? err.stack : `${name}: ${message}`;
    return { message, stack };
  }
  const message = String(err);
  return { message, stack: message };
}

/** `<prefix>: <message>\n<stack>`, the shape of every load and render failure. */
export function formatFailure(prefix: string, err: unknown): string {
  const { message, stack } = describeError(err);
  return `${prefix}: ${message}\n${stack}`;
}

export function firstLine(text: string): string {
  const newline = text.indexOf("\n");
  return newline === -1 ? text : text.slice(0, newline);
}
