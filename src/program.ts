import ts from 'typescript';
import path from 'node:path';

export const DEFAULT_LIBRARY_OPTIONS: ts.CompilerOptions = {
  strict: true,
  target: ts.ScriptTarget.ES2022,
  lib: ['lib.es2022.d.ts'],
  module: ts.ModuleKind.NodeNext,
  moduleResolution: ts.ModuleResolutionKind.NodeNext,
  skipLibCheck: true,
  noEmit: true,
};

function flatten(diagnostics: readonly ts.Diagnostic[]): string {
  return diagnostics.map(d => ts.flattenDiagnosticMessageText(d.messageText, '\n')).join('\n');
}

/** Compiler options from a tsconfig, with emit always turned off. */
export function loadCompilerOptions(tsconfigPath: string): ts.CompilerOptions {
  const unrecoverable: ts.Diagnostic[] = [];
  const host: ts.ParseConfigFileHost = {
    ...ts.sys,
    onUnRecoverableConfigFileDiagnostic: d => unrecoverable.push(d),
  };

  const parsed = ts.getParsedCommandLineOfConfigFile(path.resolve(tsconfigPath), {}, host);
  if (!parsed) {
    throw new Error(`Failed to read tsconfig: ${flatten(unrecoverable)}`);
  }
  if (parsed.errors.length > 0) {
    throw new Error(`tsconfig parse errors:\n${flatten(parsed.errors)}`);
  }
  return { ...parsed.options, noEmit: true };
}

export function createLibraryProgram(
  sourcePath: string,
  options: ts.CompilerOptions = DEFAULT_LIBRARY_OPTIONS
): ts.Program {
  return ts.createProgram([path.resolve(sourcePath)], options);
}

export function collectDiagnostics(program: ts.Program): string[] {
  const diagnostics = ts.getPreEmitDiagnostics(program);
  return diagnostics.map(d => {
    const msg = ts.flattenDiagnosticMessageText(d.messageText, '\n');
    if (d.file && d.start !== undefined) {
      const { line } = d.file.getLineAndCharacterOfPosition(d.start);
      return `${path.relative(process.cwd(), d.file.fileName)}:${line + 1}: ${msg}`;
    }
    return msg;
  });
}
