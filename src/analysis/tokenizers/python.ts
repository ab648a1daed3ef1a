/**
 * Python tokenizer using tree-sitter.
 *
 * Docstrings (a bare string as the first statement of a module, class or
 * function body) are dropped along with comments.
 *
 * Handles: .py, .pyw
 */

import Parser from "tree-sitter";
import Python from "tree-sitter-python";

import { SupportedLanguage } from "../types";
import { TreeSitterTokenizer } from "./tree-sitter";

const DOCSTRING_OWNERS = new Set(["function_definition", "class_definition"]);

export class PythonTokenizer extends TreeSitterTokenizer {
  language: SupportedLanguage = "python";

  constructor() {
    super(Python, {
      identifierTypes: new Set(["identifier"]),
      stringTypes: new Set(["string"]),
      numberTypes: new Set(["integer", "float"]),
      atomicTypes: new Set(["string"]),
      commentTypes: new Set(["comment"]),
    });
  }

  protected shouldSkip(node: Parser.SyntaxNode): boolean {
    return node.type === "expression_statement" && this.isDocstring(node);
  }

  private isDocstring(node: Parser.SyntaxNode): boolean {
    const parts = node.children;
    if (parts.length !== 1 || parts[0].type !== "string") {
      return false;
    }

    const parent = node.parent;
    if (!parent) {
      return false;
    }
    const isBody =
      parent.type === "module" ||
      (parent.type === "block" && parent.parent !== null && DOCSTRING_OWNERS.has(parent.parent.type));
    if (!isBody) {
      return false;
    }

    const firstStatement = parent.children.find((child) => child.type !== "comment");
    return firstStatement !== undefined && firstStatement.startIndex === node.startIndex;
  }
}
