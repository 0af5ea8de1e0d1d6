/**
 * Raised when a scroller is constructed with unusable options.
 */
export class ScrollerConfigError extends Error {
  option: string;

  constructor(option: string, message: string) {
    super(`${option}: ${message}`);
    this.name = 'ScrollerConfigError';
    this.option = option;
  }
}

