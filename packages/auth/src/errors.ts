export class SessionCoreError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Entropy or identifier generation failed
 */
export class GenerationError extends SessionCoreError {
  constructor(message = 'Failed to generate session material', options?: ErrorOptions) {
    super(message, options);
  }
}

/**
 * The secret hasher failed internally (never raised for a merely wrong secret)
 */
export class HashError extends SessionCoreError {
  constructor(message = 'Failed to hash session secret', options?: ErrorOptions) {
    super(message, options);
  }
}
