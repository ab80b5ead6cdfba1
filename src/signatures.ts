import ts from 'typescript';
import path from 'node:path';

/**
 * How an argument or result is checked at the call boundary. `opaque` values
 * pass through unchecked.
 */
export type ValueKind = 'number' | 'bigint' | 'string' | 'boolean' | 'number-array' | 'void' | 'opaque';

export interface ParameterSignature {
  name: string;
  type: string;
  /** For rest parameters, the kind of each element. */
  kind: ValueKind;
  optional: boolean;
  rest: boolean;
}

export interface FunctionSignature {
  name: string;
  params: ParameterSignature[];
  returnType: string;
  returnKind: ValueKind;
}

const TYPE_MAP = new Map<string, ValueKind>([
  ['number', 'number'],
  ['bigint', 'bigint'],
  ['string', 'string'],
  ['boolean', 'boolean'],
  ['void', 'void'],
  ['undefined', 'void'],
  ['number[]', 'number-array'],
  ['readonly number[]', 'number-array'],
  ['ArrayLike<number>', 'number-array'],
  ['Int32Array', 'number-array'],
  ['Int32Array<ArrayBufferLike>', 'number-array'],
]);

export function kindOf(typeText: string): ValueKind {
  return TYPE_MAP.get(typeText) ?? 'opaque';
}

function elementTypeText(typeText: string): string {
  const bare = typeText.startsWith('readonly ') ? typeText.slice('readonly '.length) : typeText;
  return bare.endsWith('[]') ? bare.slice(0, -2) : bare;
}

export function readFunctionSignatures(program: ts.Program, sourcePath: string): Map<string, FunctionSignature> {
  const checker = program.getTypeChecker();
  const sourceFile = program.getSourceFile(path.resolve(sourcePath));
  if (!sourceFile) {
    throw new Error(`Library source not found in program: ${sourcePath}`);
  }

  const signatures = new Map<string, FunctionSignature>();
  const fileSymbol = checker.getSymbolAtLocation(sourceFile);
  // A script without imports or exports has no module symbol
  if (!fileSymbol) return signatures;

  for (const exported of checker.getExportsOfModule(fileSymbol)) {
    const symbol = exported.flags & ts.SymbolFlags.Alias ? checker.getAliasedSymbol(exported) : exported;
    if (!(symbol.flags & (ts.SymbolFlags.Function | ts.SymbolFlags.Variable))) continue;

    const decl = symbol.valueDeclaration;
    if (!decl) continue;

    const callSignatures = checker.getTypeOfSymbolAtLocation(symbol, decl).getCallSignatures();
    if (callSignatures.length === 0) continue;

    const name = exported.getName();
    signatures.set(name, describeSignature(checker, name, callSignatures[0]));
  }

  return signatures;
}

function describeSignature(checker: ts.TypeChecker, name: string, signature: ts.Signature): FunctionSignature {
  const params = signature.getParameters().map(p => describeParameter(checker, p));
  const returnType = checker.typeToString(checker.getReturnTypeOfSignature(signature));
  return { name, params, returnType, returnKind: kindOf(returnType) };
}

function describeParameter(checker: ts.TypeChecker, symbol: ts.Symbol): ParameterSignature {
  const decl = symbol.valueDeclaration;
  if (!decl || !ts.isParameter(decl)) {
    return { name: symbol.getName(), type: 'unknown', kind: 'opaque', optional: true, rest: false };
  }

  // Prefer the annotation so optional parameters do not pick up `| undefined`
  const type = decl.type ? checker.getTypeFromTypeNode(decl.type) : checker.getTypeOfSymbolAtLocation(symbol, decl);
  const typeText = checker.typeToString(type);
  const rest = decl.dotDotDotToken !== undefined;

  return {
    name: symbol.getName(),
    type: typeText,
    kind: kindOf(rest ? elementTypeText(typeText) : typeText),
    optional: rest || decl.questionToken !== undefined || decl.initializer !== undefined,
    rest,
  };
}

export function formatSignature(signature: FunctionSignature): string {
  const params = signature.params.map(p => {
    const marker = p.rest ? '...' : '';
    const optional = p.optional && !p.rest ? '?' : '';
    return `${marker}${p.name}${optional}: ${p.type}`;
  });
  return `${signature.name}(${params.join(', ')}): ${signature.returnType}`;
}
