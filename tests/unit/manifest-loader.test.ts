import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, writeFile, rm } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import {
  loadManifest,
  loadRequirements,
  readManifestDependencies,
  ManifestLoadError,
} from '../../src/core/manifest-loader.js';
import { InvalidSourceError } from '../../src/core/input-resolver.js';

const PYPROJECT = `[project]
name = "demo"
version = "0.1.0"
dependencies = ["requests>=2.31", "rich"]

[project.optional-dependencies]
dev = ["pytest", "ruff==0.4.4"]
docs = []
`;

let tempDir: string;

describe('manifest-loader', () => {
  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'iso-pin-manifest-test-'));
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  it('loads a valid pyproject.toml', async () => {
    const path = join(tempDir, 'pyproject.toml');
    await writeFile(path, PYPROJECT);
    const manifest = await loadManifest(path);
    expect(readManifestDependencies(manifest)).toEqual(['requests>=2.31', 'rich']);
  });

  it('appends the optional dependency group after the base dependencies', async () => {
    const path = join(tempDir, 'pyproject.toml');
    await writeFile(path, PYPROJECT);
    const manifest = await loadManifest(path);
    expect(readManifestDependencies(manifest, 'dev')).toEqual([
      'requests>=2.31',
      'rich',
      'pytest',
      'ruff==0.4.4',
    ]);
  });

  it('accepts an empty group', async () => {
    const path = join(tempDir, 'pyproject.toml');
    await writeFile(path, PYPROJECT);
    const manifest = await loadManifest(path);
    expect(readManifestDependencies(manifest, 'docs')).toEqual(['requests>=2.31', 'rich']);
  });

  it('throws InvalidSourceError for an unknown group', async () => {
    const path = join(tempDir, 'pyproject.toml');
    await writeFile(path, PYPROJECT);
    const manifest = await loadManifest(path);
    expect(() => readManifestDependencies(manifest, 'test')).toThrow(
      "No optional dependency 'test' found in TOML file.",
    );
  });

  it('throws InvalidSourceError when no groups are defined', () => {
    expect(() =>
      readManifestDependencies({ project: { dependencies: ['rich'] } }, 'dev'),
    ).toThrow(InvalidSourceError);
  });

  it('treats a project without dependencies as empty', () => {
    expect(readManifestDependencies({ project: { name: 'demo' } })).toEqual([]);
  });

  it('throws ManifestLoadError without a project table', () => {
    expect(() => readManifestDependencies({ tool: {} })).toThrow(ManifestLoadError);
  });

  it('throws ManifestLoadError for non-string dependencies', () => {
    expect(() =>
      readManifestDependencies({ project: { dependencies: ['rich', 3] } }),
    ).toThrow('project.dependencies must be a list of strings.');
  });

  it('throws ManifestLoadError on missing file', async () => {
    await expect(loadManifest(join(tempDir, 'pyproject.toml'))).rejects.toThrow(ManifestLoadError);
  });

  it('throws ManifestLoadError on invalid TOML', async () => {
    const path = join(tempDir, 'pyproject.toml');
    await writeFile(path, '[project\nname = ');
    await expect(loadManifest(path)).rejects.toThrow(ManifestLoadError);
  });

  it('loads requirements for each source kind', async () => {
    const manifestPath = join(tempDir, 'pyproject.toml');
    const reqPath = join(tempDir, 'requirements.in');
    await writeFile(manifestPath, PYPROJECT);
    await writeFile(reqPath, '-c constraints.txt\nflask\n');

    expect(await loadRequirements({ kind: 'manifest', path: manifestPath })).toEqual({
      source: { kind: 'manifest', path: manifestPath },
      specifiers: ['requests>=2.31', 'rich'],
      options: [],
    });
    expect(
      (await loadRequirements({ kind: 'manifest-group', path: manifestPath, group: 'dev' }))
        .specifiers,
    ).toEqual(['requests>=2.31', 'rich', 'pytest', 'ruff==0.4.4']);
    expect(await loadRequirements({ kind: 'requirements-file', path: reqPath })).toEqual({
      source: { kind: 'requirements-file', path: reqPath },
      specifiers: ['flask'],
      options: ['-c', 'constraints.txt'],
    });
  });
});
