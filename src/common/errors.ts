// Copyright (c) 2025 EdgeCoder, LLC
// SPDX-License-Identifier: BUSL-1.1

export class TransportError extends Error {
  constructor(
    readonly code: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(`${code}: ${message}`, options);
    this.name = "TransportError";
  }
}

/** The listen address could not be bound. Fatal at startup. */
export class BindError extends TransportError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("bind_failed", message, options);
    this.name = "BindError";
  }
}

export class ConnectError extends TransportError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("connect_failed", message, options);
    this.name = "ConnectError";
  }
}

export class StreamError extends TransportError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("stream_failed", message, options);
    this.name = "StreamError";
  }
}

export class MalformedPayloadError extends Error {
  readonly code = "malformed_payload";
  constructor(message: string) {
    super(message);
    this.name = "MalformedPayloadError";
  }
}

export class ValidationFailureError extends Error {
  readonly code = "validation_failed";
  constructor(message: string) {
    super(message);
    this.name = "ValidationFailureError";
  }
}

export class SettlementError extends Error {
  readonly code = "settlement_failed";
  constructor(message: string) {
    super(message);
    this.name = "SettlementError";
  }
}

export class SwapQuoteError extends Error {
  readonly code = "swap_quote_failed";
  constructor(message: string) {
    super(message);
    this.name = "SwapQuoteError";
  }
}

export class ConfigError extends Error {
  readonly code = "invalid_config";
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export function isEaddrInUse(err: unknown): err is NodeJS.ErrnoException {
  return typeof err === "object" && err !== null && "code" in err && err.code === "EADDRINUSE";
}
