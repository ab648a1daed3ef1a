/**
 * Go tokenizer using tree-sitter.
 *
 * Handles: .go
 */

import Go from "tree-sitter-go";

import { SupportedLanguage } from "../types";
import { TreeSitterTokenizer } from "./tree-sitter";

const STRING_TYPES = ["interpreted_string_literal", "raw_string_literal", "rune_literal"];

export class GoTokenizer extends TreeSitterTokenizer {
  language: SupportedLanguage = "go";

  constructor() {
    super(Go, {
      identifierTypes: new Set([
        "identifier",
        "field_identifier",
        "type_identifier",
        "package_identifier",
        "label_name",
      ]),
      stringTypes: new Set(STRING_TYPES),
      numberTypes: new Set(["int_literal", "float_literal", "imaginary_literal"]),
      atomicTypes: new Set(STRING_TYPES),
      commentTypes: new Set(["comment"]),
    });
  }
}
