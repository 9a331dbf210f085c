import { basename, extname } from 'node:path';
import ts from 'typescript';

const SCRIPT_EXTENSIONS = new Set(['.ts', '.tsx', '.mts', '.cts', '.js', '.jsx', '.mjs', '.cjs']);

/**
 * Parse-only check of generated file content. Returns the first problem as a
 * message, or null when the content parses (or is not a checked file type).
 * Type errors are not reported.
 */
export function checkSyntax(filePath: string, content: string): string | null {
  const ext = extname(filePath).toLowerCase();

  if (ext === '.json') {
    try {
      JSON.parse(content);
      return null;
    } catch (error) {
      return `Invalid JSON: ${error instanceof Error ? error.message : String(error)}`;
    }
  }

  if (!SCRIPT_EXTENSIONS.has(ext)) return null;

  const output = ts.transpileModule(content, {
    fileName: basename(filePath),
    reportDiagnostics: true,
    compilerOptions: {
      target: ts.ScriptTarget.ES2022,
      module: ts.ModuleKind.ESNext,
      jsx: ts.JsxEmit.Preserve,
      allowJs: true,
    },
  });

  const diagnostic = output.diagnostics?.[0];
  if (!diagnostic) return null;

  const text = ts.flattenDiagnosticMessageText(diagnostic.messageText, '\n');
  if (diagnostic.file && diagnostic.start !== undefined) {
    const { line, character } = diagnostic.file.getLineAndCharacterOfPosition(diagnostic.start);
    return `Syntax error at ${line + 1}:${character + 1}: ${text}`;
  }
  return `Syntax error: ${text}`;
}
