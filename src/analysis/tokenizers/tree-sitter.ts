/**
 * Shared leaf walker for the tree-sitter grammars (Python, Go, Ruby).
 *
 * A token is a leaf of the concrete syntax tree, except that string-like
 * nodes listed in `atomicTypes` are taken whole so their inner pieces
 * (quotes, escapes, interpolations) do not become separate tokens.
 */

import Parser from "tree-sitter";

import { TokenizeError } from "../errors";
import { SupportedLanguage, TokenStream } from "../types";
import { LanguageTokenizer, makeToken } from "./types";

export interface GrammarTokenClasses {
  identifierTypes: Set<string>;
  stringTypes: Set<string>;
  numberTypes: Set<string>;
  /** Node types emitted as a single token without descending */
  atomicTypes: Set<string>;
  commentTypes: Set<string>;
}

const KEYWORD_PATTERN = /^[A-Za-z_]+$/;

export abstract class TreeSitterTokenizer implements LanguageTokenizer {
  abstract language: SupportedLanguage;
  protected parser: Parser;
  private classes: GrammarTokenClasses;

  /**
   * @param grammar - The module exported by a tree-sitter-* grammar package
   */
  protected constructor(grammar: unknown, classes: GrammarTokenClasses) {
    this.parser = new Parser();
    this.parser.setLanguage(grammar);
    this.classes = classes;
  }

  dialect(): string {
    return this.language;
  }

  /**
   * Subclasses return true for nodes that carry no code (e.g. docstrings).
   */
  protected shouldSkip(_node: Parser.SyntaxNode): boolean {
    return false;
  }

  tokenize(content: string): TokenStream {
    let tree: Parser.Tree;
    try {
      // The default 32 KiB input buffer rejects larger sources
      tree = this.parser.parse(content, undefined, { bufferSize: content.length * 2 + 1 });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new TokenizeError(`${this.language} parser failed: ${message}`);
    }

    const tokens: TokenStream = [];
    const { identifierTypes, stringTypes, numberTypes, atomicTypes, commentTypes } = this.classes;

    const visit = (node: Parser.SyntaxNode): void => {
      if (node.type === "ERROR") {
        throw new TokenizeError(`Syntax error in ${this.language} source`, node.startPosition.row + 1);
      }
      if (commentTypes.has(node.type) || this.shouldSkip(node)) {
        return;
      }

      if (node.childCount > 0 && !atomicTypes.has(node.type)) {
        for (const child of node.children) {
          visit(child);
        }
        return;
      }

      // Zero-width leaves are parser bookkeeping (inserted newlines, missing nodes)
      if (node.endIndex <= node.startIndex) {
        return;
      }

      const text = content.slice(node.startIndex, node.endIndex);
      if (text.trim() === "") {
        return;
      }

      const start = node.startPosition;
      const end = node.endPosition;
      const from = { line: start.row, column: start.column };
      const to = { line: end.row, column: end.column };

      if (identifierTypes.has(node.type)) {
        tokens.push(makeToken(text, "identifier", from, to));
      } else if (numberTypes.has(node.type)) {
        tokens.push(makeToken(text, "literal", from, to, "number"));
      } else if (stringTypes.has(node.type)) {
        tokens.push(makeToken(text, "literal", from, to, "string"));
      } else if (node.type === text && KEYWORD_PATTERN.test(text)) {
        tokens.push(makeToken(text, "keyword", from, to));
      } else {
        tokens.push(makeToken(text, "symbol", from, to));
      }
    };

    visit(tree.rootNode);
    return tokens;
  }
}
