// The grammar packages export a language object for Parser#setLanguage.

declare module "tree-sitter-python" {
  const language: unknown;
  export = language;
}

declare module "tree-sitter-go" {
  const language: unknown;
  export = language;
}

declare module "tree-sitter-ruby" {
  const language: unknown;
  export = language;
}
