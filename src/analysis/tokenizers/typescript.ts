/**
 * TypeScript/JavaScript tokenizer using ts-morph.
 *
 * The file is parsed rather than just scanned so that regex literals,
 * template spans and JSX text come out as the compiler sees them.
 * Tokens are the leaves of `getChildren()`; JSDoc nodes are skipped.
 *
 * Handles: .ts, .tsx, .mts, .cts, .js, .jsx, .mjs, .cjs
 */

import { Project, ts } from "ts-morph";

import { TokenizeError } from "../errors";
import { SupportedLanguage, TokenStream } from "../types";
import { LanguageTokenizer, fileExtension, makeToken } from "./types";

const NUMERIC_KINDS = new Set<ts.SyntaxKind>([ts.SyntaxKind.NumericLiteral, ts.SyntaxKind.BigIntLiteral]);

const STRING_KINDS = new Set<ts.SyntaxKind>([
  ts.SyntaxKind.StringLiteral,
  ts.SyntaxKind.NoSubstitutionTemplateLiteral,
  ts.SyntaxKind.TemplateHead,
  ts.SyntaxKind.TemplateMiddle,
  ts.SyntaxKind.TemplateTail,
  ts.SyntaxKind.RegularExpressionLiteral,
  ts.SyntaxKind.JsxText,
]);

function scriptKindFor(language: SupportedLanguage, filePath?: string): ts.ScriptKind {
  switch (filePath ? fileExtension(filePath) : "") {
    case "tsx":
      return ts.ScriptKind.TSX;
    case "jsx":
      return ts.ScriptKind.JSX;
    case "js":
    case "mjs":
    case "cjs":
      return ts.ScriptKind.JS;
    case "ts":
    case "mts":
    case "cts":
      return ts.ScriptKind.TS;
    default:
      return language === "javascript" ? ts.ScriptKind.JS : ts.ScriptKind.TS;
  }
}

function isJSDocKind(kind: ts.SyntaxKind): boolean {
  return kind >= ts.SyntaxKind.FirstJSDocNode && kind <= ts.SyntaxKind.LastJSDocNode;
}

function isKeywordKind(kind: ts.SyntaxKind): boolean {
  return kind >= ts.SyntaxKind.FirstKeyword && kind <= ts.SyntaxKind.LastKeyword;
}

export class TypeScriptTokenizer implements LanguageTokenizer {
  language: SupportedLanguage;
  private project: Project;

  constructor(language: "typescript" | "javascript" = "typescript") {
    this.language = language;
    // In-memory project; nothing is type-checked
    this.project = new Project({
      useInMemoryFileSystem: true,
      compilerOptions: {
        allowJs: true,
        checkJs: false,
        noEmit: true,
        skipLibCheck: true,
        target: ts.ScriptTarget.ESNext,
        jsx: ts.JsxEmit.Preserve,
      },
    });
  }

  /**
   * Script kind the file is parsed as: "ts", "tsx", "js" or "jsx".
   */
  dialect(filePath?: string): string {
    return ts.ScriptKind[scriptKindFor(this.language, filePath)].toLowerCase();
  }

  tokenize(content: string, filePath?: string): TokenStream {
    const sourceFile = this.project.createSourceFile("/twinscan/input", content, {
      overwrite: true,
      scriptKind: scriptKindFor(this.language, filePath),
    });

    try {
      return this.collectTokens(sourceFile.compilerNode);
    } finally {
      this.project.removeSourceFile(sourceFile);
    }
  }

  private collectTokens(sf: ts.SourceFile): TokenStream {
    const tokens: TokenStream = [];
    const text = sf.text;

    const visit = (node: ts.Node): void => {
      if (isJSDocKind(node.kind)) {
        return;
      }

      const children = node.getChildren(sf);
      if (children.length > 0) {
        for (const child of children) {
          visit(child);
        }
        return;
      }

      if (node.kind === ts.SyntaxKind.EndOfFileToken || node.kind === ts.SyntaxKind.SyntaxList) {
        return;
      }

      const start = node.getStart(sf);
      const end = node.getEnd();

      if (end <= start) {
        // The parser inserts zero-width identifiers and tokens where it expected something
        if (node.kind === ts.SyntaxKind.Identifier || node.kind <= ts.SyntaxKind.LastToken) {
          const { line } = sf.getLineAndCharacterOfPosition(start);
          throw new TokenizeError(`Syntax error: missing ${ts.SyntaxKind[node.kind]}`, line + 1);
        }
        return;
      }

      const tokenText = text.slice(start, end);
      if (tokenText.trim() === "") {
        return;
      }

      const from = sf.getLineAndCharacterOfPosition(start);
      const to = sf.getLineAndCharacterOfPosition(end);
      const startPos = { line: from.line, column: from.character };
      const endPos = { line: to.line, column: to.character };

      if (node.kind === ts.SyntaxKind.Identifier || node.kind === ts.SyntaxKind.PrivateIdentifier) {
        tokens.push(makeToken(tokenText, "identifier", startPos, endPos));
      } else if (NUMERIC_KINDS.has(node.kind)) {
        tokens.push(makeToken(tokenText, "literal", startPos, endPos, "number"));
      } else if (STRING_KINDS.has(node.kind)) {
        tokens.push(makeToken(tokenText, "literal", startPos, endPos, "string"));
      } else if (isKeywordKind(node.kind)) {
        tokens.push(makeToken(tokenText, "keyword", startPos, endPos));
      } else {
        tokens.push(makeToken(tokenText, "symbol", startPos, endPos));
      }
    };

    visit(sf);
    return tokens;
  }
}
