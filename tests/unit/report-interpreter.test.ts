import { describe, it, expect } from 'vitest';
import {
  extractHash,
  interpretReport,
  MalformedReportError,
} from '../../src/core/report-interpreter.js';
import { entry } from '../helpers/fake-runner.js';

function reportOf(...entries: unknown[]): unknown {
  return { version: '1', install: entries };
}

describe('interpretReport', () => {
  it('separates top-level packages from dependencies', () => {
    const graph = interpretReport(
      reportOf(entry('a', '1.0', { requested: true }), entry('b', '2.0')),
      ['a'],
    );
    expect(graph).toEqual({
      topLevel: [{ name: 'a', version: '1.0', topLevel: true }],
      dependencies: [{ name: 'b', version: '2.0', topLevel: false }],
    });
  });

  it('orders top-level packages by input order', () => {
    const graph = interpretReport(
      reportOf(
        entry('zeta', '1.0', { requested: true }),
        entry('Alpha', '1.0', { requested: true }),
        entry('mid', '1.0', { requested: true }),
      ),
      ['mid', 'zeta', 'alpha'],
    );
    expect(graph.topLevel.map((p) => p.name)).toEqual(['mid', 'zeta', 'Alpha']);
  });

  it('places requested packages missing from the input list after listed ones', () => {
    const graph = interpretReport(
      reportOf(
        entry('nested', '1.0', { requested: true }),
        entry('listed', '1.0', { requested: true }),
      ),
      ['listed'],
    );
    expect(graph.topLevel.map((p) => p.name)).toEqual(['listed', 'nested']);
  });

  it('classifies by normalized name when the report does not flag the entry', () => {
    const graph = interpretReport(reportOf(entry('Typing_Extensions', '4.12.2')), [
      'typing-extensions',
    ]);
    expect(graph.topLevel.map((p) => p.name)).toEqual(['Typing_Extensions']);
    expect(graph.dependencies).toEqual([]);
  });

  it('sorts dependencies case-insensitively', () => {
    const graph = interpretReport(
      reportOf(
        entry('top', '1.0', { requested: true }),
        entry('urllib3', '2.2.1'),
        entry('Certifi', '2024.2.2'),
        entry('idna', '3.7'),
      ),
      ['top'],
    );
    expect(graph.dependencies.map((p) => p.name)).toEqual(['Certifi', 'idna', 'urllib3']);
  });

  it('keeps the later entry for a duplicate name', () => {
    const graph = interpretReport(
      reportOf(entry('six', '1.15.0'), entry('Six', '1.16.0')),
      [],
    );
    expect(graph.dependencies).toEqual([{ name: 'Six', version: '1.16.0', topLevel: false }]);
  });

  it('extracts hashes when present', () => {
    const graph = interpretReport(
      reportOf(
        entry('a', '1.0', { requested: true, hashes: { sha256: 'deadbeef' } }),
        entry('b', '2.0'),
      ),
      ['a'],
    );
    expect(graph.topLevel[0].hash).toBe('sha256:deadbeef');
    expect(graph.dependencies[0].hash).toBeUndefined();
  });

  it('returns an empty graph for an empty install list', () => {
    expect(interpretReport(reportOf(), [])).toEqual({ topLevel: [], dependencies: [] });
  });

  it('names the offending entry when a field is missing', () => {
    const broken = { metadata: { name: 'b' }, requested: false };
    let caught: unknown;
    try {
      interpretReport(reportOf(entry('a', '1.0', { requested: true }), broken), ['a']);
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(MalformedReportError);
    if (caught instanceof MalformedReportError) {
      expect(caught.entry).toBe('install[1] (b)');
      expect(caught.message).toBe(
        "Malformed entry install[1] (b) in resolver report: /install/1/metadata must have required property 'version'",
      );
    }
  });

  it('names an entry by index when it has no usable name', () => {
    expect(() =>
      interpretReport(reportOf({ metadata: { version: '1.0' }, requested: true }), []),
    ).toThrow('Malformed entry install[0] in resolver report');
  });

  it('rejects a report without an install list', () => {
    expect(() => interpretReport({ version: '1' }, [])).toThrow(
      "Malformed resolver report: / must have required property 'install'",
    );
  });

  it('rejects a non-boolean requested flag', () => {
    expect(() =>
      interpretReport(reportOf({ metadata: { name: 'x', version: '1' }, requested: 'yes' }), []),
    ).toThrow(MalformedReportError);
  });
});

describe('extractHash', () => {
  it('prefers the sha256 entry of the hashes map', () => {
    expect(
      extractHash(entry('a', '1.0', { hash: 'md5=0000', hashes: { sha256: 'abc123' } })),
    ).toBe('sha256:abc123');
  });

  it('converts the legacy hash field', () => {
    expect(extractHash(entry('a', '1.0', { hash: 'sha256=abc123' }))).toBe('sha256:abc123');
  });

  it('returns undefined without archive info', () => {
    expect(extractHash(entry('a', '1.0'))).toBeUndefined();
  });
});
