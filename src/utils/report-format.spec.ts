import { formatReport } from './report-format';
import { DataSource } from '../interfaces/data-source.interface';
import { PipelineReport } from '../interfaces/pipeline-report.interface';

describe('formatReport', () => {
  const report: PipelineReport = {
    startedAt: '2025-06-01T00:00:00.000Z',
    finishedAt: '2025-06-01T00:00:00.012Z',
    durationMs: 12,
    sources: [
      {
        source: DataSource.STEAM,
        received: 3,
        droppedMissingTitle: 1,
        droppedDuplicateUrl: 0,
        droppedMalformed: 0,
        kept: 2,
      },
    ],
    skippedSources: [{ source: 'GOG', reason: 'file not found' }],
    stages: [
      { stage: 'merge', rowsIn: 2, rowsOut: 2, drops: {} },
      { stage: 'deduplication', rowsIn: 2, rowsOut: 1, drops: { 'duplicate-title': 1 } },
    ],
    mutations: { 'mark-unrated': 1 },
    outputBySource: { [DataSource.STEAM]: 1 },
    missingByColumn: { developer: 1, publisher: 0 },
    rowsIn: 3,
    rowsOut: 1,
  };

  it('should render one line per source, skip, stage and summary', () => {
    expect(formatReport(report)).toEqual([
      'Rows: 3 in, 1 out (12ms)',
      'Source Steam: received=3, kept=2, missing-title=1, duplicate-url=0, malformed=0',
      'Skipped GOG: file not found',
      'Stage merge: 2 -> 2 (dropped: -)',
      'Stage deduplication: 2 -> 1 (dropped: duplicate-title=1)',
      'Rule mutations: mark-unrated=1',
      'Output by source: Steam=1',
      'Missing values: developer=1, publisher=0',
    ]);
  });

  it('should mark empty sections', () => {
    const lines = formatReport({ ...report, mutations: {}, skippedSources: [] });

    expect(lines).toContain('Rule mutations: -');
    expect(lines).not.toContain('Skipped GOG: file not found');
  });
});
