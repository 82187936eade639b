/**
 * Text Emitter
 *
 * Formats one enum block as TypeScript source. Integer ids become an `enum`;
 * string ids become a class holding one static instance per member.
 */

import type { EmitInput, EnumShape } from './types.js';

type Emitter = (input: EmitInput) => string;

/**
 * Escape a value for a single-quoted string literal
 */
function escapeString(str: string): string {
  return str
    .replace(/\\/g, '\\\\')
    .replace(/'/g, "\\'")
    .replace(/\n/g, '\\n')
    .replace(/\r/g, '\\r')
    .replace(/\t/g, '\\t');
}

function sourceComment(input: EmitInput): string {
  return `/** Lookup values from ${input.tableName} (id: ${input.idColumn}, description: ${input.descriptionColumn}) */`;
}

function emitNumericEnum(input: EmitInput): string {
  const lines: string[] = [sourceComment(input), `export enum ${input.enumName} {`];

  for (const member of input.members) {
    lines.push(`  ${member.name} = ${member.value},`);
  }

  lines.push('}');
  return lines.join('\n') + '\n';
}

function emitStringEnum(input: EmitInput): string {
  const { enumName } = input;
  const lines: string[] = [sourceComment(input), `export class ${enumName} {`];

  for (const member of input.members) {
    lines.push(`  static readonly ${member.name} = new ${enumName}('${escapeString(member.value)}');`);
  }

  lines.push('');
  lines.push('  private constructor(public readonly value: string) {}');
  lines.push('');
  lines.push('  toString(): string {');
  lines.push('    return this.value;');
  lines.push('  }');
  lines.push('}');
  return lines.join('\n') + '\n';
}

const EMITTERS: Record<EnumShape, Emitter> = {
  numeric: emitNumericEnum,
  string: emitStringEnum,
};

export function shapeFor(idIsString: boolean): EnumShape {
  return idIsString ? 'string' : 'numeric';
}

export function emitEnum(input: EmitInput): string {
  return EMITTERS[shapeFor(input.idIsString)](input);
}
