import ts from "typescript";

const COMPILER_OPTIONS: ts.CompilerOptions = {
  target: ts.ScriptTarget.ES2022,
  module: ts.ModuleKind.CommonJS,
  // Cells are scripts sharing one global scope; never wrap them as modules.
  moduleDetection: ts.ModuleDetectionKind.Legacy,
  removeComments: false,
};

/**
 * Strip types from a TypeScript cell. Syntax errors surface as a `SyntaxError`
 * pointing at `label:line:column`, matching what V8 reports for JavaScript cells.
 */
export function transpileCell(source: string, label: string): string {
  const result = ts.transpileModule(source, {
    fileName: "cell.ts",
    reportDiagnostics: true,
    compilerOptions: COMPILER_OPTIONS,
  });

  const first = (result.diagnostics ?? []).find((d) => d.category === ts.DiagnosticCategory.Error);
  if (first) {
    const message = ts.flattenDiagnosticMessageText(first.messageText, "\n");
    if (first.file && typeof first.start === "number") {
      const { line, character } = first.file.getLineAndCharacterOfPosition(first.start);
      throw new SyntaxError(`${message} (${label}:${line + 1}:${character + 1})`);
    }
    throw new SyntaxError(`${message} (${label})`);
  }

  return result.outputText;
}
