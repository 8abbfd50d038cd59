/**
 * Host Message Channel Protocol Implementation
 *
 * Handles the binary protocol between the native host and the process that
 * drives it:
 * - 32-bit little-endian length prefix
 * - JSON encoding/decoding over stdin/stdout
 *
 * Uses the native-messaging npm package for the live stdin/stdout channel.
 */
import { Readable, Writable } from 'stream';
import nativeMessaging from 'native-messaging';
import {
  RequestMessage,
  ResponseMessage,
  createTimestamp,
  errorMessage,
  isRequestMessage,
} from '../../shared/src/index';

/** Upper bound on one framed message */
export const MAX_MESSAGE_BYTES = 64 * 1024 * 1024;

/**
 * Callback type for handling incoming messages
 */
export type OnMessageCallback = (message: RequestMessage) => ResponseMessage | Promise<ResponseMessage>;

/**
 * Host channel connection interface
 */
export interface HostConnection {
  /**
   * Send a message (response or notification)
   */
  send: (message: ResponseMessage) => void;

  /**
   * Close the channel and run the close handler
   */
  close: () => void;
}

export interface HostChannelOptions {
  /** Stream whose end closes the channel (default: stdin) */
  input?: Readable;
  /** Called when the connection closes (default: exit the process) */
  onClose?: () => void;
}

/**
 * Read a single message from a buffer
 *
 * - First 4 bytes: message length as 32-bit little-endian unsigned integer
 * - Remaining bytes: JSON-encoded message
 *
 * @returns Parsed message, or null if the buffer holds no complete message
 */
export function parseMessage(buffer: Buffer): { message: unknown; bytesConsumed: number } | null {
  // Need at least 4 bytes for the length prefix
  if (buffer.length < 4) {
    return null;
  }

  const messageLength = buffer.readUInt32LE(0);
  if (messageLength > MAX_MESSAGE_BYTES) {
    throw new Error(`Message of ${messageLength} bytes exceeds the ${MAX_MESSAGE_BYTES} byte limit`);
  }
  const totalLength = 4 + messageLength;

  if (buffer.length < totalLength) {
    return null;
  }

  const message: unknown = JSON.parse(buffer.subarray(4, totalLength).toString('utf8'));

  return {
    message,
    bytesConsumed: totalLength,
  };
}

/**
 * Encode a message with its length prefix
 */
export function encodeMessage(message: ResponseMessage | RequestMessage): Buffer {
  const jsonBuffer = Buffer.from(JSON.stringify(message), 'utf8');

  const lengthBuffer = Buffer.alloc(4);
  lengthBuffer.writeUInt32LE(jsonBuffer.length, 0);

  return Buffer.concat([lengthBuffer, jsonBuffer]);
}

/**
 * Write a message to a stream (stdout by default)
 */
export function writeMessage(message: ResponseMessage, output: Writable = process.stdout): void {
  output.write(encodeMessage(message));
}

function errorResponse(id: string, error: string): ResponseMessage {
  return { type: 'error', id, timestamp: createTimestamp(), error };
}

function requestIdOf(message: unknown): string {
  if (typeof message === 'object' && message !== null && 'id' in message && typeof message.id === 'string') {
    return message.id;
  }
  return 'unknown';
}

/**
 * Initialize the message channel
 *
 * Every request gets exactly one response carrying the request id. Handler
 * failures and invalid requests are answered with an error response.
 *
 * @example
 * ```typescript
 * const connection = initHostChannel(async (message) => {
 *   if (message.type === 'ping') {
 *     return { type: 'pong', id: message.id, timestamp: Date.now() };
 *   }
 *   return { type: 'error', id: message.id, timestamp: Date.now(), error: 'Unknown message' };
 * });
 * ```
 */
export function initHostChannel(onMessage: OnMessageCallback, options: HostChannelOptions = {}): HostConnection {
  const input = options.input ?? process.stdin;
  const onClose = options.onClose ?? (() => process.exit(0));
  let closed = false;

  const respond = async (message: unknown): Promise<void> => {
    if (!isRequestMessage(message)) {
      send(errorResponse(requestIdOf(message), 'Invalid request message'));
      return;
    }
    try {
      send(await onMessage(message));
    } catch (error) {
      send(errorResponse(message.id, errorMessage(error)));
    }
  };

  const sendMessage = nativeMessaging((message: unknown) => {
    void respond(message);
  });

  const send = (message: ResponseMessage): void => {
    if (!closed) {
      sendMessage(message);
    }
  };

  const close = (): void => {
    if (closed) return;
    closed = true;
    input.off('end', close);
    onClose();
  };

  input.on('end', close);

  return { send, close };
}
