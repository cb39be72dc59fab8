export interface ScanOptions {
  /** gitignore-style patterns, matched against every path element */
  ignorePatterns?: string[];
}

export interface GoPackage {
  /** Repository-relative POSIX directory, `.` for the root */
  dir: string;
  /** Non-test `.go` files, repository-relative */
  sourceFiles: string[];
  /** `_test.go` files, repository-relative */
  testFiles: string[];
}

export interface GoSourceTree {
  repoRoot: string;
  /** `module` path from go.mod, empty when there is none */
  modulePath: string;
  /** Sorted by directory */
  packages: GoPackage[];
}
