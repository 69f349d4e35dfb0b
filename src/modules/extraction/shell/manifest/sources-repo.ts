import fs from 'node:fs/promises';
import path from 'node:path';

import { Type, type Static } from '@sinclair/typebox';
import { TypeCompiler } from '@sinclair/typebox/compiler';
import { err, ok, type Result } from 'neverthrow';
import { parse as parseYaml } from 'yaml';

import { errorMessage, toFileSystemError } from '@/common/types/errors.js';

import { formatSchemaErrors, type SourcesManifestError } from '../../core/errors.js';
import { SOURCE_TYPES } from '../../core/types.js';

import type { SourceEntry, SourcesRepo } from '../../core/ports.js';

// ─────────────────────────────────────────────────────────────────────────────
// Schema
// ─────────────────────────────────────────────────────────────────────────────

export const SourceEntrySchema = Type.Object(
  {
    year: Type.Integer({ minimum: 2000, maximum: 2100 }),
    type: Type.Union(SOURCE_TYPES.map((sourceType) => Type.Literal(sourceType))),
    path: Type.String({ minLength: 1 }),
  },
  { additionalProperties: false }
);

export const SourcesManifestSchema = Type.Object({
  sources: Type.Array(SourceEntrySchema),
});

export type SourcesManifestDTO = Static<typeof SourcesManifestSchema>;

const validator = TypeCompiler.Compile(SourcesManifestSchema);

// ─────────────────────────────────────────────────────────────────────────────
// Repository
// ─────────────────────────────────────────────────────────────────────────────

export interface SourcesRepoOptions {
  /** YAML manifest; relative entry paths resolve against its directory */
  manifestPath: string;
}

const readManifest = async (
  filePath: string
): Promise<Result<SourcesManifestDTO, SourcesManifestError>> => {
  let contents: string;
  try {
    contents = await fs.readFile(filePath, 'utf8');
  } catch (error) {
    const fsError = toFileSystemError(error, filePath, 'read');
    return err({
      type: fsError.type === 'NotFound' ? 'NotFound' : 'ReadError',
      message:
        fsError.type === 'NotFound' ? `Sources manifest not found at ${filePath}` : fsError.message,
    });
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(contents);
  } catch (error) {
    return err({
      type: 'ParseError',
      message: `Failed to parse YAML at ${filePath}: ${errorMessage(error)}`,
    });
  }

  if (!validator.Check(parsed)) {
    return err({
      type: 'SchemaValidationError',
      message: `Schema validation failed for ${filePath}`,
      details: formatSchemaErrors(validator.Errors(parsed)),
    });
  }

  return ok(parsed);
};

export const createSourcesRepo = (options: SourcesRepoOptions): SourcesRepo => {
  const baseDir = path.dirname(path.resolve(options.manifestPath));

  return {
    async list(): Promise<Result<SourceEntry[], SourcesManifestError>> {
      const manifest = await readManifest(options.manifestPath);
      if (manifest.isErr()) {
        return err(manifest.error);
      }

      const seen = new Set<string>();
      const entries: SourceEntry[] = [];

      for (const source of manifest.value.sources) {
        const key = `${String(source.year)}_${source.type}`;
        if (seen.has(key)) {
          return err({
            type: 'DuplicateEntry',
            message: `Source ${key} is listed more than once in ${options.manifestPath}`,
            year: source.year,
            sourceType: source.type,
          });
        }
        seen.add(key);

        entries.push({
          year: source.year,
          sourceType: source.type,
          path: path.resolve(baseDir, source.path),
        });
      }

      return ok(entries);
    },
  };
};
