export type DiagnosticSeverity = 'error' | 'warning';

export type DiagnosticCode =
  | 'missing-module-docstring'
  | 'missing-class-docstring'
  | 'missing-docstring'
  | 'unknown-field'
  | 'duplicate-field'
  | 'extra-param'
  | 'missing-param-description'
  | 'missing-param-type'
  | 'missing-param'
  | 'missing-return'
  | 'missing-return-description'
  | 'missing-rtype-description'
  | 'missing-rtype'
  | 'unexpected-return';

export interface DiagnosticLocation {
  name: string;
  line: number;
}

export interface Diagnostic {
  readonly severity: DiagnosticSeverity;
  readonly code: DiagnosticCode;
  readonly message: string;
  readonly location: Readonly<DiagnosticLocation>;
}

export function errorDiagnostic(
  code: DiagnosticCode,
  message: string,
  location: DiagnosticLocation
): Diagnostic {
  const diagnostic: Diagnostic = {
    severity: 'error',
    code,
    message,
    location: Object.freeze({ ...location }),
  };
  return Object.freeze(diagnostic);
}

export function warningDiagnostic(
  code: DiagnosticCode,
  message: string,
  location: DiagnosticLocation
): Diagnostic {
  const diagnostic: Diagnostic = {
    severity: 'warning',
    code,
    message,
    location: Object.freeze({ ...location }),
  };
  return Object.freeze(diagnostic);
}
