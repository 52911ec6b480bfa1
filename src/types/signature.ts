export type SignatureKind = 'module' | 'class' | 'function' | 'method' | 'staticmethod';

export type CallableKind = 'function' | 'method' | 'staticmethod';

export interface Parameter {
  name: string;
  hasDefault: boolean;
}

interface SignatureBase {
  name: string;
  line: number;
  docstring: string | null;
  isPrivate: boolean;
  children: SignatureNode[];
}

export interface ModuleSignature extends SignatureBase {
  kind: 'module';
  filePath: string;
}

export interface ClassSignature extends SignatureBase {
  kind: 'class';
}

export interface CallableSignature extends SignatureBase {
  kind: CallableKind;
  /** Documentable parameters; the receiver of an instance method is never listed here. */
  parameters: Parameter[];
  /** First parameter of a method (`self`, `cls`), kept for display only. */
  receiver: string | null;
  returnsValue: boolean;
}

export type SignatureNode = ModuleSignature | ClassSignature | CallableSignature;

export function isCallable(node: SignatureNode): node is CallableSignature {
  return node.kind === 'function' || node.kind === 'method' || node.kind === 'staticmethod';
}

/**
 * Leading underscore marks a name as internal, except dunder names like `__init__`.
 */
export function isPrivateName(name: string): boolean {
  if (!name.startsWith('_')) return false;
  const isDunder = name.length > 4 && name.startsWith('__') && name.endsWith('__');
  return !isDunder;
}
