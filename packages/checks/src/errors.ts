/** A user-supplied option (filter pattern, argument, connection setting) is unusable. */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/** The inventory snapshot contradicts itself, e.g. a LUN with no topology entry. */
export class DataConsistencyError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'DataConsistencyError';
  }
}
