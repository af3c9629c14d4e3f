/**
 * Error Type Definitions
 *
 * Categories, codes and recovery hints for structured networking errors
 */

/**
 * Error categories for classification
 */
export enum ErrorCategory {
  CONNECT = 'connect',
  HANDSHAKE = 'handshake',
  PROTOCOL = 'protocol',
  CHANNEL = 'channel',
  CONFIG = 'config',
}

/**
 * Error severity levels
 */
export enum ErrorSeverity {
  LOW = 'low',
  MEDIUM = 'medium',
  HIGH = 'high',
  CRITICAL = 'critical',
}

/**
 * What the caller is expected to do with the failure
 */
export enum ErrorRecoveryType {
  /** Try the same address again later */
  RETRY = 'retry',
  /** Drop or demote the address and move on */
  SKIP = 'skip',
  /** Close the affected channel */
  DISCONNECT = 'disconnect',
  /** Abort startup */
  FATAL = 'fatal',
}

export enum ErrorCode {
  // Connect errors
  CONNECT_FAILED = 'CONNECT_FAILED',
  CONNECTION_REFUSED = 'CONNECTION_REFUSED',
  CONNECTION_NOT_ALLOWED = 'CONNECTION_NOT_ALLOWED',
  HOST_UNREACHABLE = 'HOST_UNREACHABLE',
  NETWORK_UNREACHABLE = 'NETWORK_UNREACHABLE',
  CONNECT_TIMEOUT = 'CONNECT_TIMEOUT',
  PROXY_MALFORMED_REPLY = 'PROXY_MALFORMED_REPLY',
  PROXY_UNSUPPORTED_VERSION = 'PROXY_UNSUPPORTED_VERSION',
  PROXY_NO_ACCEPTABLE_METHODS = 'PROXY_NO_ACCEPTABLE_METHODS',
  PROXY_COMMAND_NOT_SUPPORTED = 'PROXY_COMMAND_NOT_SUPPORTED',
  PROXY_ADDRESS_TYPE_NOT_SUPPORTED = 'PROXY_ADDRESS_TYPE_NOT_SUPPORTED',
  PROXY_UNASSIGNED_REPLY = 'PROXY_UNASSIGNED_REPLY',
  TLS_VERIFICATION_FAILED = 'TLS_VERIFICATION_FAILED',

  // Handshake errors
  HANDSHAKE_VERSION_MISMATCH = 'HANDSHAKE_VERSION_MISMATCH',
  HANDSHAKE_TIMEOUT = 'HANDSHAKE_TIMEOUT',
  HANDSHAKE_MALFORMED = 'HANDSHAKE_MALFORMED',

  // Protocol errors
  MALFORMED_PACKET = 'MALFORMED_PACKET',
  MALFORMED_MESSAGE = 'MALFORMED_MESSAGE',
  PAYLOAD_TOO_LARGE = 'PAYLOAD_TOO_LARGE',
  HEARTBEAT_TIMEOUT = 'HEARTBEAT_TIMEOUT',
  REQUEST_TIMEOUT = 'REQUEST_TIMEOUT',

  // Channel errors
  CHANNEL_STOPPED = 'CHANNEL_STOPPED',

  // Configuration errors
  INVALID_ADDRESS = 'INVALID_ADDRESS',
  DISALLOWED_TRANSPORT = 'DISALLOWED_TRANSPORT',
  INVALID_SETTINGS = 'INVALID_SETTINGS',
}

/**
 * Error context for debugging
 */
export interface ErrorContext {
  address?: string
  operation?: string
  socksReply?: number
  [key: string]: unknown
}
