export class InvalidPriceError extends Error {
  constructor(message = 'current price must be positive') {
    super(message);
    this.name = 'InvalidPriceError';
  }
}

export class PriceFetchError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PriceFetchError';
  }
}

export class ZoneFetchError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ZoneFetchError';
  }
}

/**
 * 쿨다운 저장소 재시도 소진
 */
export class CooldownStorageError extends Error {
  attempts: number;

  constructor(action: string, attempts: number, options?: { cause?: unknown }) {
    super(`cooldown store ${action} failed after ${attempts} attempts`, options);
    this.name = 'CooldownStorageError';
    this.attempts = attempts;
  }
}

export class AlertConfigError extends Error {
  issues: string[];

  constructor(issues: string[]) {
    super(`invalid alert configuration:\n- ${issues.join('\n- ')}`);
    this.name = 'AlertConfigError';
    this.issues = issues;
  }
}
