export class ValidationError extends Error {
  constructor(message: string, public details?: unknown) {
    super(message);
    this.name = 'ValidationError';
  }
}

export class FieldValidationError extends ValidationError {
  constructor(public field: string, message: string = `invalid field name: ${field}`) {
    super(message, { field });
    this.name = 'FieldValidationError';
  }
}

export class UnsupportedFeatureError extends Error {
  constructor(message: string, public feature: string) {
    super(message);
    this.name = 'UnsupportedFeatureError';
  }
}

export class ScopeNotFoundError extends Error {
  constructor(public category: string, public scope: string) {
    super(`${category} scope '${scope}' is not registered`);
    this.name = 'ScopeNotFoundError';
  }
}

export class CompilationError extends Error {
  constructor(public errors: readonly Error[]) {
    super(errors.map((e) => e.message).join('; '));
    this.name = 'CompilationError';
  }
}

export class NotFoundError extends Error {
  constructor(message: string, public table?: string) {
    super(message);
    this.name = 'NotFoundError';
  }
}

export class DatabaseError extends Error {
  constructor(message: string, public code?: string) {
    super(message);
    this.name = 'DatabaseError';
  }
}

export class PluginError extends Error {
  constructor(
    message: string,
    public pluginName: string,
    public hookName: string,
    public originalError?: Error
  ) {
    super(message);
    this.name = 'PluginError';
  }
}

export class PluginTimeoutError extends PluginError {
  constructor(
    pluginName: string,
    hookName: string,
    public timeout: number
  ) {
    super(
      `Plugin '${pluginName}' hook '${hookName}' timed out after ${timeout}ms`,
      pluginName,
      hookName
    );
    this.name = 'PluginTimeoutError';
  }
}
