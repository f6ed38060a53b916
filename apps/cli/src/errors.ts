export class Mib2TemplateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'Mib2TemplateError';
  }
}

export class ConfigValidationError extends Mib2TemplateError {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigValidationError';
  }
}

export class TranslatorNotFoundError extends Mib2TemplateError {
  constructor(readonly command: string) {
    super(`"${command}" not found. Install net-snmp and make sure snmptranslate is available on PATH.`);
    this.name = 'TranslatorNotFoundError';
  }
}

export class MibLoadError extends Mib2TemplateError {
  constructor(message: string) {
    super(message);
    this.name = 'MibLoadError';
  }
}

export class SymbolEnumerationError extends Mib2TemplateError {
  constructor(message: string) {
    super(message);
    this.name = 'SymbolEnumerationError';
  }
}

export class EmptyMibError extends Mib2TemplateError {
  constructor(message: string) {
    super(message);
    this.name = 'EmptyMibError';
  }
}

export class TemplateWriteError extends Mib2TemplateError {
  constructor(readonly outputPath: string, cause: unknown) {
    super(`Failed to write template to ${outputPath}: ${cause instanceof Error ? cause.message : String(cause)}`);
    this.name = 'TemplateWriteError';
  }
}
