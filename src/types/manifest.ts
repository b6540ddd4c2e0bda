export type RequirementSource =
  | { kind: 'requirements-file'; path: string }
  | { kind: 'manifest'; path: string }
  | { kind: 'manifest-group'; path: string; group: string };

/**
 * Top-level requirements read from a source, in declaration order.
 *
 * `specifiers` are PEP 508 strings. `options` holds resolver option tokens
 * found in a requirements file (`-c constraints.txt`, `--index-url ...`).
 */
export interface RequirementSet {
  source: RequirementSource;
  specifiers: string[];
  options: string[];
}
