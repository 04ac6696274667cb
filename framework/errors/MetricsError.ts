export class MetricsConfigError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'MetricsConfigError';
    Object.setPrototypeOf(this, MetricsConfigError.prototype);
  }
}
