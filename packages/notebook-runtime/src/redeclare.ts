import ts from "typescript";

interface Edit {
  start: number;
  end: number;
  text: string;
}

/**
 * Rewrite a script's top-level `let`/`const` statements and named class
 * declarations into `var` bindings, so that running the same cell again in a
 * context that already holds them redeclares instead of throwing.
 *
 * Line numbers and the completion value are unchanged. Returns `source` itself
 * when there is nothing to rewrite.
 */
export function redeclarableSource(source: string): string {
  const file = ts.createSourceFile("cell.js", source, ts.ScriptTarget.Latest, true, ts.ScriptKind.JS);
  const edits: Edit[] = [];

  for (const statement of file.statements) {
    if (ts.isVariableStatement(statement)) {
      const keyword = statement.declarationList.getFirstToken(file);
      if (keyword && (keyword.kind === ts.SyntaxKind.LetKeyword || keyword.kind === ts.SyntaxKind.ConstKeyword)) {
        edits.push({ start: keyword.getStart(file), end: keyword.getEnd(), text: "var" });
      }
    } else if (ts.isClassDeclaration(statement) && statement.name) {
      const start = statement.getStart(file);
      edits.push({ start, end: start, text: `var ${statement.name.text} = ` });
      edits.push({ start: statement.getEnd(), end: statement.getEnd(), text: ";" });
    }
  }

  if (edits.length === 0) return source;

  let output = source;
  for (const edit of edits.sort((a, b) => b.start - a.start)) {
    output = output.slice(0, edit.start) + edit.text + output.slice(edit.end);
  }
  return output;
}
