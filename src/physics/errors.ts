// Raised while building a simulation from bad parameters or initial conditions.
// The physics step itself never throws.
export class ConfigurationError extends Error {
  constructor(
    message: string,
    public readonly field?: string
  ) {
    super(field ? `${field}: ${message}` : message);
    this.name = 'ConfigurationError';
  }
}
