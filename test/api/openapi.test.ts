import { mkdtempSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { describe, it, expect } from 'vitest';
import { loadOpenApiDocument } from '../../src/api/openapi/index.js';

function writeSpec(contents: string): string {
  const path = join(mkdtempSync(join(tmpdir(), 'openapi-')), 'spec.yaml');
  writeFileSync(path, contents);
  return path;
}

describe('loadOpenApiDocument', () => {
  it('loads the bundled document', () => {
    expect(loadOpenApiDocument()).toMatchObject({ info: { title: 'Text Anomaly Detection API' } });
  });

  it('rejects a document that is not a mapping', () => {
    const path = writeSpec('- just\n- a list\n');

    expect(() => loadOpenApiDocument(path)).toThrow(`OpenAPI document at ${path} is not a YAML mapping`);
  });
});
