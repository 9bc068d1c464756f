/**
 * A backend that can turn a prompt into generated text.
 *
 * Implementations reject with a `GenerationError` subclass and keep no
 * per-call state, so one instance may serve concurrent calls.
 */
export interface GenerationClient {
  generate(prompt: string): Promise<string>;
}

export type FetchImpl = typeof globalThis.fetch;

export interface ClientOptions {
  fetchImpl?: FetchImpl;
}
