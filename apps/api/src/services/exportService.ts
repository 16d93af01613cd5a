import { findSelected } from '../repositories/resultRepository';
import { SelectedResult } from '../types';

export type ExportFormat = 'markdown' | 'json';

export interface ExportDocument {
  filename: string;
  contentType: string;
  body: string;
}

export interface SerializedSelectedResult {
  id: number;
  promptId: number;
  promptText: string;
  modelId: number;
  modelName: string;
  response: string;
  errorKind: string | null;
  createdAt: string;
}

export function isExportFormat(value: unknown): value is ExportFormat {
  return value === 'markdown' || value === 'json';
}

export function serializeSelectedResult(result: SelectedResult): SerializedSelectedResult {
  return {
    id: result.id,
    promptId: result.promptId,
    promptText: result.promptText,
    modelId: result.modelId,
    modelName: result.modelName,
    response: result.responseText,
    errorKind: result.errorKind,
    createdAt: result.createdAt.toISOString()
  };
}

export function renderMarkdown(results: readonly SelectedResult[], exportedAt: Date): string {
  const sections = results.map(
    (result) =>
      `## ${result.modelName}\n\n` +
      `**Prompt:** ${result.promptText}\n\n` +
      `**Date:** ${result.createdAt.toISOString()}\n\n` +
      `**Response:**\n\n${result.responseText}\n\n` +
      '---\n'
  );
  return [`# Selected results\n`, `Exported: ${exportedAt.toISOString()}\n`, ...sections].join('\n');
}

export function renderJson(results: readonly SelectedResult[]): string {
  return JSON.stringify(results.map(serializeSelectedResult), null, 2);
}

function timestampForFilename(date: Date): string {
  return date.toISOString().replace(/[:.]/g, '-');
}

export async function exportSelectedResults(
  format: ExportFormat,
  exportedAt: Date = new Date()
): Promise<ExportDocument> {
  const results = await findSelected();
  const stamp = timestampForFilename(exportedAt);

  if (format === 'json') {
    return {
      filename: `selected-results-${stamp}.json`,
      contentType: 'application/json; charset=utf-8',
      body: renderJson(results)
    };
  }

  return {
    filename: `selected-results-${stamp}.md`,
    contentType: 'text/markdown; charset=utf-8',
    body: renderMarkdown(results, exportedAt)
  };
}
