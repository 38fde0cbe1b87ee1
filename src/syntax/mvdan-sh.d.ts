/** Minimal type declarations for mvdan-sh (the JavaScript build of mvdan.cc/sh). */
declare module "mvdan-sh" {
  interface Pos {
    Line(): number;
    Col(): number;
    Offset(): number;
    IsValid(): boolean;
  }

  interface ShellNode {
    [key: string]: unknown;
  }

  interface Parser {
    /** Parse a shell string into a File node. Throws on syntax errors. */
    Parse(input: string, name: string): ShellNode;
  }

  interface Syntax {
    /** Return the node kind name (e.g. "CallExpr", "Lit", "DblQuoted"). */
    NodeType(node: unknown): string;
    /** Create a new shell parser instance. */
    NewParser(...options: unknown[]): Parser;
  }

  const sh: { syntax: Syntax };
  export default sh;
  export type { Pos, ShellNode, Parser, Syntax };
}
