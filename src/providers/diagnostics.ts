/**
 * Diagnostics provider for breaking change findings
 * Converts findings into LSP diagnostics grouped by document URI
 */

import { Diagnostic, DiagnosticSeverity } from 'vscode-languageserver/node';
import { URI } from 'vscode-uri';
import { ChangeType, Finding } from '../core/findings';
import { Settings } from '../utils/types';

export type DiagnosticsOptions = Settings['diagnostics'];

const SEVERITY_BY_CHANGE_TYPE: Record<ChangeType, DiagnosticSeverity> = {
  [ChangeType.MAJOR]: DiagnosticSeverity.Error,
  [ChangeType.MINOR]: DiagnosticSeverity.Information,
  [ChangeType.PATCH]: DiagnosticSeverity.Hint
};

/**
 * Map a proto file name from a descriptor set to a document URI
 */
export function findingUri(file: string, root?: string): string {
  if (/^[a-z][a-z0-9+.-]*:\/\//i.test(file)) {
    return file;
  }
  const absolute = root ? `${root.replace(/[\\/]+$/, '')}/${file}` : file;
  return URI.file(absolute).toString();
}

export function toDiagnostic(finding: Finding, source: string): Diagnostic {
  // Descriptor lines are 1-based, LSP lines 0-based
  const line = Math.max(finding.location.line - 1, 0);
  return {
    severity: SEVERITY_BY_CHANGE_TYPE[finding.changeType],
    range: {
      start: { line, character: 0 },
      end: { line: line + 1, character: 0 }
    },
    message: finding.message,
    source,
    code: finding.category
  };
}

/**
 * Group findings by file as diagnostics. Non-breaking findings are dropped unless requested.
 * @param root - Directory the descriptor file names are relative to
 */
export function toDiagnostics(
  findings: readonly Finding[],
  options: DiagnosticsOptions,
  root?: string
): Map<string, Diagnostic[]> {
  const byUri = new Map<string, Diagnostic[]>();

  for (const finding of findings) {
    if (!finding.actionable && !options.includeNonBreaking) {
      continue;
    }
    const uri = findingUri(finding.location.file, root);
    const list = byUri.get(uri) ?? [];
    list.push(toDiagnostic(finding, options.source));
    byUri.set(uri, list);
  }

  return byUri;
}
