import { PipelineReport } from '../interfaces/pipeline-report.interface';

function formatCounts(counts: Record<string, number | undefined>): string {
  const entries = Object.entries(counts).filter(
    (entry): entry is [string, number] => entry[1] !== undefined,
  );
  if (entries.length === 0) {
    return '-';
  }
  return entries.map(([key, value]) => `${key}=${value}`).join(', ');
}

/**
 * Human-readable lines summarizing a pipeline report
 */
export function formatReport(report: PipelineReport): string[] {
  const lines: string[] = [];

  lines.push(`Rows: ${report.rowsIn} in, ${report.rowsOut} out (${report.durationMs}ms)`);

  for (const source of report.sources) {
    lines.push(
      `Source ${source.source}: received=${source.received}, kept=${source.kept}, ` +
        `missing-title=${source.droppedMissingTitle}, duplicate-url=${source.droppedDuplicateUrl}, ` +
        `malformed=${source.droppedMalformed}`,
    );
  }

  for (const skipped of report.skippedSources) {
    lines.push(`Skipped ${skipped.source}: ${skipped.reason}`);
  }

  for (const stage of report.stages) {
    lines.push(
      `Stage ${stage.stage}: ${stage.rowsIn} -> ${stage.rowsOut} (dropped: ${formatCounts(stage.drops)})`,
    );
  }

  lines.push(`Rule mutations: ${formatCounts(report.mutations)}`);
  lines.push(`Output by source: ${formatCounts(report.outputBySource)}`);
  lines.push(`Missing values: ${formatCounts(report.missingByColumn)}`);

  return lines;
}
