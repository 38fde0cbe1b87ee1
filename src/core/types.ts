/**
 * Shared types for sh2go
 */

import type { SourceLocation } from "./errors.js";

export type BackendName = "exec" | "gexe";

export interface Sh2GoConfig {
  /** Go toolchain executable */
  goBinary?: string;
  /** Module path written by `go mod init` */
  moduleName?: string;
  /** Process-execution backend targeted by generated code */
  backend?: BackendName;
  /** Keep the build workspace after `build` */
  keepWorkspace?: boolean;
  /** Directory under which build workspaces are created (default: OS tmp) */
  workspaceRoot?: string;
  /** Extra flags passed to `go build` */
  buildFlags?: string[];
  /** Per-tool timeout in milliseconds */
  timeout?: number;
}

/** Config with every field resolved */
export type ResolvedConfig = Required<Omit<Sh2GoConfig, "workspaceRoot">> & {
  workspaceRoot?: string;
};

export interface Diagnostic {
  level: "error" | "warning" | "info";
  message: string;
  location?: SourceLocation;
}
