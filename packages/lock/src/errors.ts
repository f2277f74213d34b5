/**
 * Base class for every error raised by the lock library.
 *
 * Store failures are not wrapped: whatever the node-redis client (or any
 * other {@link LockStore}) throws reaches the caller as-is.
 *
 * @public
 */
export class LockError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Thrown when lock options or call arguments are invalid.
 *
 * Always raised before the store is contacted.
 *
 * @public
 */
export class ConfigurationError extends LockError {
  constructor(
    public readonly parameter: string,
    public readonly value: unknown,
    public readonly expected: string,
    message = `Invalid ${parameter}: expected ${expected}`
  ) {
    super(message);
  }
}

/**
 * Thrown when a timeout is negative or not an integer number of milliseconds.
 * @public
 */
export class InvalidTimeoutError extends ConfigurationError {
  constructor(value: unknown) {
    super('timeoutMs', value, 'non-negative integer');
  }
}

/**
 * Thrown when a timeout is passed to a non-blocking acquire.
 * @public
 */
export class TimeoutNotUsableError extends ConfigurationError {
  constructor(value: number) {
    super(
      'timeoutMs',
      value,
      'no timeout',
      'Timeout cannot be used if blocking is false'
    );
  }
}

/**
 * Thrown when the acquire timeout outlives the lock expiry and auto-renewal
 * is off, since the lock could expire while the caller is still waiting.
 * @public
 */
export class TimeoutTooLargeError extends ConfigurationError {
  constructor(timeoutMs: number, expireMs: number) {
    super(
      'timeoutMs',
      timeoutMs,
      `value not greater than expireMs (${expireMs})`,
      `Timeout (${timeoutMs}ms) cannot be greater than expire (${expireMs}ms) without auto-renewal`
    );
  }
}

/**
 * Thrown when extending a lock that has no expiry.
 * @public
 */
export class NotExpirableError extends ConfigurationError {
  constructor(name: string) {
    super('expireMs', undefined, 'an expiry', `Lock '${name}' has no expiry and cannot be extended`);
  }
}

/**
 * Thrown when acquiring a lock that this handle (or its owner id) already holds.
 * @public
 */
export class AlreadyAcquiredError extends LockError {
  constructor(
    public readonly lockName: string,
    public readonly ownerId: string
  ) {
    super(`Lock '${lockName}' is already held by id '${ownerId}'`);
  }
}

/**
 * Thrown when releasing or extending a lock this handle's id does not hold.
 * @public
 */
export class NotAcquiredError extends LockError {
  constructor(
    public readonly lockName: string,
    public readonly ownerId: string
  ) {
    super(`Lock '${lockName}' is not held by id '${ownerId}'`);
  }
}

/**
 * Thrown by {@link Lock.withLock} when a timed acquire gives up.
 * @public
 */
export class AcquireTimeoutError extends LockError {
  constructor(
    public readonly lockName: string,
    public readonly timeoutMs: number
  ) {
    super(`Failed to acquire lock '${lockName}' within ${timeoutMs}ms`);
  }
}
