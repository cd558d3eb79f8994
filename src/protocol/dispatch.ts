/**
 * Type-directed dispatch of incoming messages.
 *
 * A handler is bound to exactly one message definition with `on()`. Given an
 * incoming header, `selectHandler()` walks the handlers in the order they were
 * passed and returns the first whose message matches. Order matters: a fixed
 * and a partial message with the same ids can both accept a header, and the
 * earlier handler wins. Nothing is selected for an unknown message.
 */

import type { Header } from './header';
import {
  decodePayload,
  splitPayload,
  type MessageDefinition,
  type MessageDescriptor,
} from './message';
import { matchesHeader } from './validator';

type Awaitable<T> = T | Promise<T>;

export type FixedHandler<T> = (payload: T) => Awaitable<void>;
export type PartialHandler<T> = (payload: T, trailing: Uint8Array) => Awaitable<void>;
type AnyHandler<T> = (payload: T, trailing?: Uint8Array) => Awaitable<void>;

export interface Handler {
  readonly message: MessageDescriptor;
  /** Decode `body` for the bound message and call the handler */
  invoke(body: Uint8Array): Promise<void>;
}

/**
 * Bind a handler to a message definition.
 *
 * @example
 * ```typescript
 * await client.receiveOneOf(
 *   on(AttclientProcedureCompletedEvent, (event) => { done = true; }),
 *   on(AttclientAttributeValueEvent, (event, value) => { values.push(value); })
 * );
 * ```
 */
export function on<T extends object>(
  message: MessageDefinition<T, 'fixed'>,
  handler: FixedHandler<T>
): Handler;
export function on<T extends object>(
  message: MessageDefinition<T, 'partial'>,
  handler: PartialHandler<T>
): Handler;
export function on<T extends object>(
  message: MessageDefinition<T>,
  handler: AnyHandler<T>
): Handler {
  return {
    message,
    async invoke(body: Uint8Array): Promise<void> {
      if (message.kind === 'fixed') {
        await handler(decodePayload(message, body));
        return;
      }
      const { payload, trailing } = splitPayload(message, body);
      await handler(payload, trailing);
    },
  };
}

/**
 * First handler whose message accepts `header`, in the given order.
 */
export function selectHandler(
  handlers: readonly Handler[],
  header: Header
): Handler | undefined {
  return handlers.find((handler) => matchesHeader(handler.message, header));
}
