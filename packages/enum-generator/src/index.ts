/**
 * @lookup-enums/enum-generator
 *
 * Turns lookup tables into TypeScript enums, driven by a list of rule lines.
 */

// Types
export type {
  Rule,
  RuleParseOptions,
  PatternMatch,
  ResolvedSpec,
  Resolution,
  MissingColumn,
  EnumMember,
  EnumBlock,
  BlockResult,
  EnumShape,
  EmitInput,
  GeneratorLogger,
  EnumGeneratorOptions,
  GeneratedTable,
} from './types.js';
export { DEFAULT_MULTI_PREFIX } from './types.js';

// Rule parsing
export { parseRule, parseRules, compilePattern, matchesTable } from './rule-parser.js';

// Column resolution
export { resolveColumns, defaultEnumName } from './column-resolver.js';

// Block generation
export { BlockBuilder, buildBlocks } from './block-generator.js';

// Emission
export { emitEnum, shapeFor } from './emitters.js';

// Orchestration
export { EnumGenerator, createEnumGenerator, buildRowQuery } from './generator.js';

// Identifier sanitizer
export { sanitizeIdentifier } from '@lookup-enums/shared';
