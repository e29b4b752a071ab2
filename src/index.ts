export { TreeGenerator } from './generator.js';
export { toTree, writeValue, type ToTreeOptions, type WriteValueOptions } from './serialize.js';
export {
    TreeMap,
    TreeSequence,
    toPlain,
    type TreeComposite,
    type TreeScalar,
    type TreeValue,
    type PlainValue,
} from './tree.js';
export { BASE64, BASE64_URL, alphabetByName, encodeRange } from './alphabet.js';
export {
    TreeGeneratorError,
    ArgumentError,
    StructuralViolationError,
    UnsupportedOperationError,
    formatViolation,
} from './errors.js';
export { loadConfig, type Config } from './config.js';
export { createLogger } from './logger.js';
export {
    type State,
    type BinaryAlphabet,
    type GeneratorOptions,
} from './types.js';
