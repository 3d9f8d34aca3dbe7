/**
 * Tests for YAML helpers.
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { z } from 'zod';
import { ErrorCodes, SystemError } from '../../../src/utils/errors.js';
import { loadYamlWithSchema, parseYaml, parseYamlWithSchema } from '../../../src/utils/yaml.js';

const Schema = z.object({ name: z.string(), count: z.number().default(1) });

describe('parseYaml', () => {
  it('should parse YAML documents', () => {
    expect(parseYaml('name: demo\nitems: [a, b]\n')).toEqual({ name: 'demo', items: ['a', 'b'] });
  });

  it('should wrap syntax errors', () => {
    expect(() => parseYaml('a: [unclosed')).toThrow(SystemError);
  });
});

describe('parseYamlWithSchema', () => {
  it('should validate and apply defaults', () => {
    expect(parseYamlWithSchema('name: demo\n', Schema)).toEqual({ name: 'demo', count: 1 });
  });

  it('should report the failing path', () => {
    expect(() => parseYamlWithSchema('count: 2\n', Schema)).toThrow(/^YAML validation failed: name: /);
  });
});

describe('loadYamlWithSchema', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'markwright-yaml-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('should load a file', async () => {
    const file = join(dir, 'demo.yaml');
    writeFileSync(file, 'name: demo\ncount: 3\n');

    expect(await loadYamlWithSchema(file, Schema)).toEqual({ name: 'demo', count: 3 });
  });

  it('should add the file path to validation errors', async () => {
    const file = join(dir, 'bad.yaml');
    writeFileSync(file, 'count: 3\n');

    await expect(loadYamlWithSchema(file, Schema)).rejects.toMatchObject({
      code: ErrorCodes.INVALID_SCHEMA,
      details: expect.objectContaining({ filePath: file }),
    });
  });

  it('should fail for missing files', async () => {
    await expect(loadYamlWithSchema(join(dir, 'missing.yaml'), Schema)).rejects.toMatchObject({
      code: ErrorCodes.PARSE_ERROR,
      message: `Failed to load YAML file: ${join(dir, 'missing.yaml')}`,
    });
  });
});
