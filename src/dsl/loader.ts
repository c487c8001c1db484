/**
 * Spec file loading. YAML and JSON are both accepted (JSON is YAML).
 */

import { readFile } from 'fs/promises';
import yaml from 'js-yaml';
import { SpecError, createTypedError } from '../domain/errors';
import { PipelineSpec } from '../domain/pipeline';
import { parsePipelineSpec } from './validator';

/** Parse spec text into a typed spec. Throws SpecError on syntax or structure errors. */
export function parsePipelineSpecText(text: string, source = '<inline>'): PipelineSpec {
  let doc: unknown;
  try {
    doc = yaml.load(text, { filename: source });
  } catch (err) {
    const mark = err instanceof yaml.YAMLException ? err.mark : undefined;
    throw new SpecError(
      createTypedError({
        code: 'SPEC.PARSE',
        message: `Cannot parse ${source}: ${err instanceof Error ? err.message : String(err)}`,
        retryable: false,
        details: mark ? { source, line: mark.line + 1, column: mark.column + 1 } : { source },
      }),
    );
  }
  return parsePipelineSpec(doc);
}

/** Read and parse a spec file. */
export async function loadPipelineSpecFile(path: string): Promise<PipelineSpec> {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (err) {
    throw new SpecError(
      createTypedError({
        code: 'SPEC.UNREADABLE',
        message: `Cannot read spec file ${path}: ${err instanceof Error ? err.message : String(err)}`,
        retryable: false,
        details: { path },
      }),
    );
  }
  return parsePipelineSpecText(text, path);
}
