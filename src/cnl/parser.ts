import { isMap, isScalar, parseDocument } from 'yaml';
import type { Diagnostic } from '../kernel/diagnostics.js';
import { RelationSpecSchema, VariantDocumentSchema, type RelationSpecInput } from './schemas.js';
import { relation, REMOVED, type MoveDeclaration, type RelationSpec, type VariantDeclarations } from './variant-spec.js';

export interface VariantDocument {
  /** `classic`, `empty`, a built-in variant name, or a path to another document. */
  readonly extends?: string;
  readonly declarations: VariantDeclarations;
}

export interface ParseVariantResult {
  readonly document: VariantDocument | null;
  readonly diagnostics: readonly Diagnostic[];
}

export interface ParseVariantOptions {
  readonly maxInputBytes?: number;
  readonly sourcePath?: string;
}

const DEFAULT_MAX_INPUT_BYTES = 256 * 1024;

export function parseVariantDocument(yamlText: string, options: ParseVariantOptions = {}): ParseVariantResult {
  const diagnostics: Diagnostic[] = [];
  const source = options.sourcePath === undefined ? {} : { sourcePath: options.sourcePath };
  const maxInputBytes = options.maxInputBytes ?? DEFAULT_MAX_INPUT_BYTES;

  const inputBytes = Buffer.byteLength(yamlText, 'utf8');
  if (inputBytes > maxInputBytes) {
    diagnostics.push({
      code: 'RPS_PARSER_MAX_INPUT_BYTES_EXCEEDED',
      path: 'parser.input',
      severity: 'error',
      message: `Input exceeds maxInputBytes (${inputBytes} > ${maxInputBytes}).`,
      ...source,
    });
    return { document: null, diagnostics };
  }

  const yamlDoc = parseDocument(yamlText, {
    schema: 'core',
    strict: true,
    uniqueKeys: true,
  });

  if (yamlDoc.errors.length > 0) {
    for (const error of yamlDoc.errors) {
      const line = error.linePos?.[0]?.line;
      const col = error.linePos?.[0]?.col;
      diagnostics.push({
        code: 'RPS_PARSER_YAML_PARSE_ERROR',
        path: 'parser.yaml',
        severity: 'error',
        message:
          line !== undefined
            ? `YAML parse error at line ${line}${col !== undefined ? `, col ${col}` : ''}: ${error.message}`
            : error.message,
        ...source,
      });
    }
    return { document: null, diagnostics };
  }

  const parsed = VariantDocumentSchema.safeParse(yamlDoc.toJSON() ?? {});
  if (!parsed.success) {
    for (const issue of parsed.error.issues) {
      diagnostics.push({
        code: 'RPS_PARSER_SCHEMA_INVALID',
        path: ['document', ...issue.path.map(String)].join('.'),
        severity: 'error',
        message: issue.message,
        ...source,
      });
    }
    return { document: null, diagnostics };
  }

  // Key order of the YAML mapping is the declaration order.
  const movesNode = yamlDoc.get('moves', true);
  const orderedNames = isMap(movesNode)
    ? movesNode.items.map((pair) => String(isScalar(pair.key) ? pair.key.value : pair.key))
    : [];
  const moves = parsed.data.moves ?? {};
  const declarations = orderedNames.map((name) => [name, toMoveDeclaration(moves[name])] as const);

  return {
    document: {
      ...(parsed.data.extends === undefined ? {} : { extends: parsed.data.extends }),
      declarations,
    },
    diagnostics,
  };
}

function toMoveDeclaration(value: unknown): MoveDeclaration {
  const spec = RelationSpecSchema.safeParse(value);
  return spec.success ? relation(toRelationSpec(spec.data)) : REMOVED;
}

function toRelationSpec(input: RelationSpecInput): RelationSpec {
  return {
    ...(input.string === undefined ? {} : { string: input.string }),
    ...(input.inputString === undefined ? {} : { inputString: input.inputString }),
    ...(input.beats === undefined ? {} : { beats: input.beats }),
    ...(input.losesTo === undefined ? {} : { losesTo: input.losesTo }),
  };
}
