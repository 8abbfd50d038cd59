/**
 * Shared core and message types for the keyreel native host and the
 * presentation layer that drives it
 */

// Re-export model modules
export * from './errors';
export * from './key-labels';
export * from './input-event';
export * from './normalizer';
export * from './macro';
export * from './display';

// Re-export engine modules
export * from './recording-session';
export * from './trigger-matcher';
export * from './replay';

// Re-export orchestration modules
export * from './logging';
export * from './settings';
export * from './event-queue';
export * from './scheduler';
export * from './observers';
export * from './interfaces';
export * from './controller';
export * from './macro-library';

/**
 * Message types for the host message channel
 */
export type RequestMessageType =
  | 'ping'
  | 'get_status'
  | 'get_macros'
  | 'create_macro'
  | 'rename_macro'
  | 'delete_macro'
  | 'record_start'
  | 'record_stop'
  | 'bind_start'
  | 'bind_cancel'
  | 'execute_macro'
  | 'request_authorization';

export type ResponseMessageType =
  | 'pong'
  | 'result'
  | 'error'
  | 'STATUS_UPDATE'
  | 'RECORDING_EVENT'
  | 'MACRO_TRIGGERED'
  | 'MACRO_COMPLETE'
  | 'MACRO_ERROR';

export type MessageType = RequestMessageType | ResponseMessageType;

/**
 * Base message interface for the host channel
 */
export interface BaseMessage {
  type: string;
  id: string;
  timestamp: number;
}

/**
 * Request message from the presentation layer to the native host
 */
export interface RequestMessage extends BaseMessage {
  type: RequestMessageType;
  payload?: unknown;
}

/**
 * Response or notification from the native host
 */
export interface ResponseMessage extends BaseMessage {
  type: ResponseMessageType;
  payload?: unknown;
  error?: string;
}

/**
 * Union type for all messages
 */
export type Message = RequestMessage | ResponseMessage;

const REQUEST_TYPES: readonly RequestMessageType[] = [
  'ping',
  'get_status',
  'get_macros',
  'create_macro',
  'rename_macro',
  'delete_macro',
  'record_start',
  'record_stop',
  'bind_start',
  'bind_cancel',
  'execute_macro',
  'request_authorization',
];

function isRequestType(value: unknown): value is RequestMessageType {
  return REQUEST_TYPES.some(type => type === value);
}

/**
 * Validate a decoded message as a request
 */
export function isRequestMessage(value: unknown): value is RequestMessage {
  if (typeof value !== 'object' || value === null) return false;
  if (!('type' in value) || !isRequestType(value.type)) return false;
  if (!('id' in value) || typeof value.id !== 'string') return false;
  return 'timestamp' in value && typeof value.timestamp === 'number';
}

/**
 * Helper to create a unique message ID
 */
export function createMessageId(): string {
  return `${Date.now()}-${Math.random().toString(36).slice(2, 11)}`;
}

/**
 * Helper to create a timestamp
 */
export function createTimestamp(): number {
  return Date.now();
}
