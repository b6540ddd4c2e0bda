export interface ResolvedPackage {
  /** Display name as reported by the resolver. */
  name: string;
  version: string;
  /** True when the package was explicitly requested rather than pulled in. */
  topLevel: boolean;
  /** "<algorithm>:<digest>" of the artifact pip selected, when reported. */
  hash?: string;
}

export interface DependencyGraph {
  topLevel: ResolvedPackage[];
  dependencies: ResolvedPackage[];
}

export interface InstalledPackage {
  name: string;
  version: string;
  editable: boolean;
}

export function allPackages(graph: DependencyGraph): ResolvedPackage[] {
  return [...graph.topLevel, ...graph.dependencies];
}
