export type ErrorContext = {
  domain?: string;
  provider?: string;
  kind?: string;
  selection?: string;
};

export class ClientResolutionError extends Error {
  readonly code: string;
  readonly details: ErrorContext & Record<string, unknown>;
  readonly cause?: unknown;

  constructor(code: string, message: string, details: ErrorContext & Record<string, unknown> = {}, cause?: unknown) {
    super(message);
    this.name = 'ClientResolutionError';
    this.code = code;
    this.details = details;
    if (cause !== undefined) this.cause = cause;
  }
}

export class ConfigurationLoadError extends ClientResolutionError {
  constructor(message: string, details: ErrorContext & { source: string }, cause?: unknown) {
    super('configuration_load_failed', message, details, cause);
    this.name = 'ConfigurationLoadError';
  }
}

export class InvalidSelectionError extends ClientResolutionError {
  readonly selection: string;

  constructor(selection: string, reason: string, details: ErrorContext = {}) {
    super('invalid_selection', `Invalid selection '${selection}': ${reason}`, { ...details, selection });
    this.name = 'InvalidSelectionError';
    this.selection = selection;
  }
}

export class ConfigurationNotFoundError extends ClientResolutionError {
  readonly selection: string;

  constructor(selection: string, available: string[], details: ErrorContext = {}) {
    const hint = available.length ? available.join(', ') : 'none';
    super('configuration_not_found', `No configuration found for '${selection}'. Available: ${hint}`, {
      ...details,
      selection,
      available,
    });
    this.name = 'ConfigurationNotFoundError';
    this.selection = selection;
  }
}

export type FieldIssue = {
  field: string;
  reason: string;
};

export class ValidationError extends ClientResolutionError {
  readonly fields: FieldIssue[];

  constructor(selection: string, fields: FieldIssue[], details: ErrorContext = {}) {
    const listed = fields.map((f) => `${f.field} (${f.reason})`).join(', ');
    super('validation_failed', `Invalid configuration for '${selection}': ${listed}`, { ...details, selection, fields });
    this.name = 'ValidationError';
    this.fields = fields;
  }
}

export class UnknownProviderError extends ClientResolutionError {
  constructor(provider: string, domain: string, registered: string[]) {
    super(
      'unknown_provider',
      `Unknown ${domain} provider '${provider}'. Registered: ${registered.length ? registered.join(', ') : 'none'}`,
      { domain, provider, registered },
    );
    this.name = 'UnknownProviderError';
  }
}

export class UnsupportedProviderError extends ClientResolutionError {
  constructor(provider: string, details: ErrorContext = {}, reason = 'is configured but has no client constructor') {
    super('unsupported_provider', `Provider '${provider}' ${reason}`, { ...details, provider });
    this.name = 'UnsupportedProviderError';
  }
}

export class ProviderUnavailableError extends ClientResolutionError {
  readonly dependency: string;
  readonly installHint: string;

  constructor(provider: string, dependency: string, details: ErrorContext = {}, cause?: unknown) {
    const installHint = `npm install ${dependency}`;
    super(
      'provider_unavailable',
      `Provider '${provider}' requires '${dependency}', which is not installed (${installHint})`,
      { ...details, provider, dependency, installHint },
      cause,
    );
    this.name = 'ProviderUnavailableError';
    this.dependency = dependency;
    this.installHint = installHint;
  }
}

export class RegistryConflictError extends ClientResolutionError {
  constructor(name: string, domain: string, reason: string, subject: 'provider' | 'datasource' = 'provider') {
    super('registry_conflict', `Cannot register ${domain} ${subject} '${name}': ${reason}`, {
      domain,
      ...(subject === 'provider' ? { provider: name } : { datasource: name }),
    });
    this.name = 'RegistryConflictError';
  }
}
