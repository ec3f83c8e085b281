// libregroup/src/index.ts
// Public API — re-exports the conversion engine.

// Types
export type {
    ProxyEntry,
    Matcher,
    RegexMatcher,
    StemMatcher,
    RegistryEntry,
    CompiledRegistryEntry,
    PatternRegistry,
    Bucket,
    BucketKind,
    BucketMap,
    ClassifyStrategy,
    ClassifyOptions,
    SelectGroup,
    LoadBalanceGroup,
    Group,
    ConvertMode,
    ConvertOptions,
} from './types.js';

export type { ConvertErrorCode } from './errors.js';
export type { DecomposedName } from './decompose.js';
export type { EmitInput } from './emit.js';
export type { FixedGroupNames, LoadBalanceCommon } from './groups.js';
export type { LoggerOptions } from './logger.js';
export type { ParsedSubscription } from './parse.js';
export type { ConversionResult } from './convert.js';

// Errors
export {
    ConvertError,
    ParseError,
    ClassifyError,
    EmitError,
    ConfigError,
    isConvertError,
} from './errors.js';

// Matchers and registry
export { regexMatcher, stemMatcher, matches, clientFilter, unionFilter } from './matcher.js';
export {
    CATCH_ALL_PATTERN,
    DEFAULT_REGISTRY_ENTRIES,
    DEFAULT_REGISTRY,
    compileRegistry,
    lookupEntry,
    lookupBucket,
    precedingPatterns,
} from './registry.js';

// Classification
export { STEM_DELIMITERS, decomposeName, stemOf } from './decompose.js';
export { INFO_BUCKET, INFO_KEYWORDS, INFO_PATTERN, isInfoNode } from './info.js';
export { classify, bucketOf, assignments } from './classify.js';

// Groups
export {
    DEFAULT_ORDER,
    BEFORE_ORDER,
    AFTER_ORDER,
    BUILTIN_OUTBOUNDS,
    GroupArena,
    membersOf,
    validateGroups,
} from './arena.js';
export {
    DEFAULT_TRAFFIC,
    NODE_SELECT,
    ALL_NODES,
    DIRECT_CONNECT,
    STEM_GROUP_SUFFIX,
    LB_COMMON,
    LB_ANCHOR,
    RULES,
    defaultRules,
    GENERAL_SETTINGS,
    selectGroup,
    loadBalanceGroup,
    rule,
} from './groups.js';
export { resolveFixedNames, synthesizeGroups, uniqueName } from './synthesize.js';

// Emission and pipeline
export { MERGE_KEY, emitDocument } from './emit.js';
export { parseSubscription } from './parse.js';
export {
    DEFAULT_CONVERT_OPTIONS,
    classifyOptionsFor,
    convert,
    convertSubscription,
} from './convert.js';

// Ambient
export { logger, createLogger } from './logger.js';
export {
    parseBool,
    parseNumber,
    parseString,
    parseEnum,
    parseConvertArgs,
    CONVERT_MODES,
} from './helpers.js';
