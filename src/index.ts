export { sumOfSquares } from './routines/array.js';
export { fibonacci } from './routines/fib.js';
export { createString, freeString } from './routines/string-lib.js';

export {
  type Allocator,
  HeapAllocator,
  defaultAllocator,
  ReleaseError,
  DoubleReleaseError,
  UseAfterReleaseError,
} from './allocator.js';
export { OwnedString } from './owned-string.js';

export { Porter, profileCallable, profileAsync, type PorterOptions, type PortedFunction, type Profile } from './porter.js';
export {
  type FunctionSignature,
  type ParameterSignature,
  type ValueKind,
  readFunctionSignatures,
  formatSignature,
  kindOf,
} from './signatures.js';
export { DEFAULT_LIBRARY_OPTIONS, loadCompilerOptions, createLibraryProgram, collectDiagnostics } from './program.js';
export { type PorterConfig, parseArgs, BUILTIN_LIBRARY_PATH } from './config.js';
