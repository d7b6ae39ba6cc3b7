export class TenantRequiredError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TenantRequiredError';
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}
