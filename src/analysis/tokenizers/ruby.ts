/**
 * Ruby tokenizer using tree-sitter.
 *
 * Strings, symbols, regexes and heredoc bodies are single tokens,
 * interpolations included.
 *
 * Handles: .rb, .rake, .ru
 */

import Ruby from "tree-sitter-ruby";

import { SupportedLanguage } from "../types";
import { TreeSitterTokenizer } from "./tree-sitter";

const STRING_TYPES = [
  "string",
  "subshell",
  "character",
  "regex",
  "simple_symbol",
  "delimited_symbol",
  "heredoc_body",
  "string_array",
  "symbol_array",
];

export class RubyTokenizer extends TreeSitterTokenizer {
  language: SupportedLanguage = "ruby";

  constructor() {
    super(Ruby, {
      identifierTypes: new Set([
        "identifier",
        "constant",
        "instance_variable",
        "class_variable",
        "global_variable",
      ]),
      stringTypes: new Set(STRING_TYPES),
      numberTypes: new Set(["integer", "float", "rational", "complex"]),
      atomicTypes: new Set(STRING_TYPES),
      commentTypes: new Set(["comment"]),
    });
  }
}
