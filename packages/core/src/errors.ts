/**
 * Error Taxonomy
 *
 * Every failure surfaces to the caller as one of these; nothing is retried.
 *
 * @module core/errors
 */

export class DaqError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'DaqError';
  }
}

/**
 * Caller supplied an out-of-range or unsupported value.
 * Raised before any request is sent.
 */
export class InvalidParameterError extends DaqError {
  constructor(
    message: string,
    public parameter: string,
    public value?: unknown
  ) {
    super(message);
    this.name = 'InvalidParameterError';
  }
}

/**
 * Transport failure: unreachable host, timeout, connection reset.
 */
export class DeviceCommunicationError extends DaqError {
  constructor(
    message: string,
    public url: string,
    cause?: unknown
  ) {
    super(message, { cause });
    this.name = 'DeviceCommunicationError';
  }
}

/**
 * The device answered, but with an unexpected status or payload.
 */
export class DeviceProtocolError extends DaqError {
  constructor(
    message: string,
    public url?: string,
    public status?: number,
    public body?: string
  ) {
    super(message);
    this.name = 'DeviceProtocolError';
  }
}

/**
 * The module is in the wrong state for the requested operation.
 */
export class DeviceStateError extends DeviceProtocolError {
  constructor(
    public operation: string,
    public expected: string,
    public actual: string
  ) {
    super(`Recorder must be in state '${expected}' to ${operation}; it is currently in state '${actual}'`);
    this.name = 'DeviceStateError';
  }
}

/**
 * The referenced recording does not exist on the device.
 */
export class NotFoundError extends DaqError {
  constructor(public recordingId: string) {
    super(`Recording ${recordingId} does not exist on the device`);
    this.name = 'NotFoundError';
  }
}

/**
 * The container bytes cannot be decoded.
 */
export class MalformedContainerError extends DaqError {
  constructor(
    message: string,
    public offset?: number
  ) {
    super(offset === undefined ? message : `${message} (at byte ${offset})`);
    this.name = 'MalformedContainerError';
  }
}
