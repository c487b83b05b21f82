import type { MeterContext } from '@nem12sql/core';

/**
 * Finite state machine for one parse invocation.
 *
 * Transitions:
 * - `no-context` → `has-context` on a `200` record
 * - `has-context` → `has-context` on a `200` record (the context is replaced, never merged)
 * - `no-context` | `has-context` → `done` on a `900` record
 * - `done` → (terminal)
 */
export type ParserState =
  | { readonly kind: 'no-context' }
  | { readonly kind: 'has-context'; readonly context: MeterContext }
  | { readonly kind: 'done' };

export const INITIAL_STATE: ParserState = { kind: 'no-context' };

export function withContext(context: MeterContext): ParserState {
  return { kind: 'has-context', context };
}

export const DONE: ParserState = { kind: 'done' };
