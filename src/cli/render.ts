/**
 * Report rendering for the CLI
 *
 * Renderers return strings; the command decides where they are written.
 */

import yaml from 'js-yaml';
import type { InspectionReport } from '@/app/inspector';
import type { OutputFormat } from '@/config/app-config';
import { findImageError, formatReference } from '@/lib/image';
import { formatPath } from '@/types';

export interface ReportView {
  globalRegistry?: string;
  detected: Array<{
    path: string;
    pattern: string;
    image: string;
    templated: boolean;
  }>;
  unsupported: Array<{
    path: string;
    classification: string;
    code?: string;
    message: string;
  }>;
  proposals: InspectionReport['proposals'];
}

/**
 * Flatten a report into plain data for JSON and YAML output
 */
export function toReportView(report: InspectionReport): ReportView {
  const view: ReportView = {
    detected: report.detected.map((image) => ({
      path: formatPath(image.path),
      pattern: image.pattern,
      image: image.templated ? image.reference.original : formatReference(image.reference),
      templated: image.templated,
    })),
    unsupported: report.unsupported.map((entry) => {
      const code = findImageError(entry.cause)?.code;
      return {
        path: formatPath(entry.path),
        classification: entry.classification,
        ...(code ? { code } : {}),
        message: entry.cause.message,
      };
    }),
    proposals: report.proposals,
  };
  if (report.globalRegistry) {
    view.globalRegistry = report.globalRegistry;
  }
  return view;
}

/**
 * Box-drawn table, one string per line
 */
export function renderTable(headers: readonly string[], rows: ReadonlyArray<readonly string[]>): string[] {
  const widths = headers.map((header, i) =>
    Math.max(header.length, ...rows.map((row) => (row[i] ?? '').length)),
  );
  const border = (left: string, middle: string, right: string): string =>
    `${left}─${widths.map((w) => '─'.repeat(w)).join(`─${middle}─`)}─${right}`;
  const line = (cells: readonly string[]): string =>
    `│ ${widths.map((w, i) => (cells[i] ?? '').padEnd(w)).join(' │ ')} │`;

  return [border('┌', '┬', '┐'), line(headers), border('├', '┼', '┤'), ...rows.map(line), border('└', '┴', '┘')];
}

function renderReportTable(view: ReportView): string {
  const lines: string[] = [];

  if (view.globalRegistry) {
    lines.push(`Global registry: ${view.globalRegistry}`, '');
  }

  if (view.detected.length === 0) {
    lines.push('No images detected');
  } else {
    lines.push(`Detected images (${view.detected.length}):`);
    lines.push(
      ...renderTable(
        ['Path', 'Image', 'Pattern'],
        view.detected.map((d) => [d.path, d.image, d.templated ? `${d.pattern} (templated)` : d.pattern]),
      ),
    );
  }

  if (view.unsupported.length > 0) {
    lines.push('', `Unsupported (${view.unsupported.length}):`);
    lines.push(
      ...renderTable(
        ['Path', 'Classification', 'Reason'],
        view.unsupported.map((u) => [u.path, u.classification, u.message]),
      ),
    );
  }

  if (view.proposals.length > 0) {
    lines.push('', `Proposed targets (${view.proposals.length}):`);
    lines.push(
      ...renderTable(
        ['Path', 'Source', 'Target'],
        view.proposals.map((p) => [p.path, p.source, p.target]),
      ),
    );
  }

  return lines.join('\n');
}

/**
 * Render an inspection report in the requested format
 */
export function renderReport(report: InspectionReport, format: OutputFormat): string {
  const view = toReportView(report);
  switch (format) {
    case 'table':
      return renderReportTable(view);
    case 'json':
      return JSON.stringify(view, null, 2);
    case 'yaml':
      return yaml.dump(view, { noRefs: true }).trimEnd();
  }
}
