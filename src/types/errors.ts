/**
 * Global error types for the change logger
 * Every failure the tool reports to the user is one of these
 */

/**
 * Base error for all modules
 */
export class MiniserverError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'MiniserverError';
  }
}

/**
 * Error thrown when the structure document lacks the controls or rooms
 * collection after envelope resolution, or holds a control that is not an object
 */
export class MalformedInventoryError extends MiniserverError {
  constructor(message: string) {
    super(message);
    this.name = 'MalformedInventoryError';
  }
}

/**
 * Error thrown when a selection token cannot be applied to the listing.
 * Recoverable: the prompt asks again.
 */
export class SelectionSyntaxError extends MiniserverError {
  readonly token: string;
  readonly reason: string;

  constructor(token: string, reason: string) {
    super('Invalid selection "' + token + '": ' + reason);
    this.name = 'SelectionSyntaxError';
    this.token = token;
    this.reason = reason;
  }
}

/**
 * Error thrown when a request to the controller fails in a way that may
 * succeed on a later attempt (timeout, connection loss, bad response)
 */
export class TransientFetchError extends MiniserverError {
  readonly url: string;
  readonly entityId?: string;

  constructor(message: string, url: string, options?: ErrorOptions & { entityId?: string }) {
    super(message, options);
    this.name = 'TransientFetchError';
    this.url = url;
    this.entityId = options?.entityId;
  }
}

/**
 * Error thrown when the controller rejects the configured credentials.
 * Never retried automatically.
 */
export class AuthenticationError extends MiniserverError {
  readonly user: string;

  constructor(user: string, status: number) {
    super(
      'Controller rejected credentials for user "' + user + '" (HTTP ' + status + '). ' +
      'Check LOXONE_USER and LOXONE_PASSWORD.'
    );
    this.name = 'AuthenticationError';
    this.user = user;
  }
}

/**
 * Error thrown when a change record cannot be written.
 * Stops a monitoring run.
 */
export class RecordPersistError extends MiniserverError {
  readonly path: string;

  constructor(path: string, options?: ErrorOptions) {
    const cause = options?.cause instanceof Error ? ': ' + options.cause.message : '';
    super('Failed to write record to ' + path + cause, options);
    this.name = 'RecordPersistError';
    this.path = path;
  }
}

/**
 * Error thrown when the loaded configuration does not validate
 */
export class ConfigValidationError extends MiniserverError {
  readonly fields: string[];

  constructor(fields: string[], message: string) {
    super(message);
    this.name = 'ConfigValidationError';
    this.fields = fields;
  }
}
