/**
 * Base Error Classes
 *
 * Structured networking errors with categories, codes and recovery hints
 */

import {
  ErrorCategory,
  ErrorCode,
  type ErrorContext,
  ErrorRecoveryType,
  ErrorSeverity,
} from './types'

/**
 * Base error class for all networking errors
 */
export class NetError extends Error {
  public readonly code: ErrorCode
  public readonly category: ErrorCategory
  public readonly severity: ErrorSeverity
  public readonly recoveryType: ErrorRecoveryType
  public readonly context?: ErrorContext
  public readonly timestamp: number

  constructor(
    message: string,
    options: {
      code: ErrorCode
      category: ErrorCategory
      severity?: ErrorSeverity
      recoveryType?: ErrorRecoveryType
      context?: ErrorContext
      cause?: unknown
    },
  ) {
    super(message, { cause: options.cause })
    this.name = new.target.name
    this.code = options.code
    this.category = options.category
    this.severity = options.severity ?? ErrorSeverity.MEDIUM
    this.recoveryType = options.recoveryType ?? ErrorRecoveryType.SKIP
    this.context = options.context
    this.timestamp = Date.now()

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target)
    }
  }

  /**
   * Serialize error for logging or RPC responses
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      category: this.category,
      severity: this.severity,
      recoveryType: this.recoveryType,
      context: this.context,
      timestamp: this.timestamp,
    }
  }

  shouldRetry(): boolean {
    return this.recoveryType === ErrorRecoveryType.RETRY
  }
}

type SubclassOptions = {
  code: ErrorCode
  context?: ErrorContext
  cause?: unknown
}

/**
 * Dial failures: refused, unreachable, timed out, bad proxy reply
 */
export class ConnectError extends NetError {
  constructor(message: string, options: SubclassOptions) {
    super(message, {
      ...options,
      category: ErrorCategory.CONNECT,
      severity: ErrorSeverity.LOW,
      recoveryType:
        options.code === ErrorCode.CONNECT_TIMEOUT
          ? ErrorRecoveryType.RETRY
          : ErrorRecoveryType.SKIP,
    })
  }
}

export class HandshakeError extends NetError {
  constructor(message: string, options: SubclassOptions) {
    super(message, {
      ...options,
      category: ErrorCategory.HANDSHAKE,
      severity: ErrorSeverity.LOW,
      recoveryType: ErrorRecoveryType.SKIP,
    })
  }
}

/**
 * Malformed traffic on an established channel
 */
export class ProtocolError extends NetError {
  constructor(message: string, options: SubclassOptions) {
    super(message, {
      ...options,
      category: ErrorCategory.PROTOCOL,
      severity: ErrorSeverity.MEDIUM,
      recoveryType: ErrorRecoveryType.DISCONNECT,
    })
  }
}

export class ChannelStoppedError extends NetError {
  constructor(address?: string, cause?: unknown) {
    super(address ? `channel ${address} stopped` : 'channel stopped', {
      code: ErrorCode.CHANNEL_STOPPED,
      category: ErrorCategory.CHANNEL,
      severity: ErrorSeverity.LOW,
      recoveryType: ErrorRecoveryType.SKIP,
      context: { address },
      cause,
    })
  }
}

/**
 * Invalid settings, addresses or transport schemes. Fatal at startup.
 */
export class ConfigError extends NetError {
  constructor(message: string, options: SubclassOptions) {
    super(message, {
      ...options,
      category: ErrorCategory.CONFIG,
      severity: ErrorSeverity.CRITICAL,
      recoveryType: ErrorRecoveryType.FATAL,
    })
  }
}

export const isNetError = (err: unknown): err is NetError =>
  err instanceof NetError
