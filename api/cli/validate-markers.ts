#!/usr/bin/env node
// api/cli/validate-markers.ts - Health check for a marker configuration file
import { logger } from '../_lib/logger';
import { ConfigError, PatternCompileError, serializeError } from '../_lib/errors';
import { loadMarkerSetFromFile, resolveMarkersPath } from '../_lib/services/markerLoader';
import { compile } from '../_lib/services/patternCompiler';
import { parseArgs, processIO, type CliIO } from './args';
import type { Category, MarkerSet } from '../_lib/types/markerTypes';

interface CategoryCount {
  category: Category;
  positive: number;
  negative: number;
}

export interface MarkerValidationReport {
  timestamp: string;
  file: string;
  version: string | null;
  categories: CategoryCount[];
  driftGroups: Array<{ name: string; patterns: number }>;
  errors: string[];
  overallStatus: 'healthy' | 'error';
}

function countMarkers(markerSet: MarkerSet): Pick<MarkerValidationReport, 'categories' | 'driftGroups'> {
  return {
    categories: markerSet.categories.map(c => ({
      category: c.category,
      positive: c.positive.tokens.length + c.positive.patterns.length,
      negative: c.negative.tokens.length + c.negative.patterns.length,
    })),
    driftGroups: markerSet.driftGroups.map(g => ({ name: g.name, patterns: g.patterns.length })),
  };
}

function describeFailure(error: unknown): string[] {
  if (error instanceof PatternCompileError) {
    return error.failures.map(f => {
      const where = f.origin.kind === 'category' ? `${f.origin.category}/${f.origin.polarity}` : f.origin.group;
      return `${where}: ${f.markerKind} "${f.pattern}": ${f.reason}`;
    });
  }
  if (error instanceof ConfigError && error.issues.length > 0) {
    return error.issues.map(i => `${i.path}: ${i.message}`);
  }
  return [error instanceof Error ? error.message : String(error)];
}

export function validateMarkers(file?: string, now: Date = new Date()): MarkerValidationReport {
  const resolved = resolveMarkersPath(file);
  const report: MarkerValidationReport = {
    timestamp: now.toISOString(),
    file: resolved,
    version: null,
    categories: [],
    driftGroups: [],
    errors: [],
    overallStatus: 'healthy',
  };

  try {
    const markerSet = loadMarkerSetFromFile(resolved);
    Object.assign(report, countMarkers(markerSet), { version: markerSet.version ?? null });
    compile(markerSet, { mode: 'collect-all' });
  } catch (error) {
    report.errors = describeFailure(error);
    report.overallStatus = 'error';
  }

  return report;
}

function render(report: MarkerValidationReport): string[] {
  const lines = [
    `Marker file: ${report.file}`,
    `Version: ${report.version ?? 'unversioned'}`,
    `Status: ${report.overallStatus}`,
  ];
  for (const c of report.categories) {
    lines.push(`  ${c.category.padEnd(8)} +${c.positive} / -${c.negative}`);
  }
  for (const g of report.driftGroups) {
    lines.push(`  drift ${g.name}: ${g.patterns}`);
  }
  if (report.errors.length > 0) {
    lines.push(`Errors (${report.errors.length}):`, ...report.errors.map(e => `  - ${e}`));
  }
  return lines;
}

export function runValidate(argv: readonly string[], io: CliIO = processIO): number {
  logger.logToStderr();
  const { flags } = parseArgs(argv, ['json']);
  const report = validateMarkers(flags.markers);

  if (report.overallStatus === 'error') {
    logger.error('Marker validation failed', { file: report.file, errorCount: report.errors.length });
  } else {
    logger.info('Marker validation passed', { file: report.file });
  }

  if (flags.json) {
    io.out(JSON.stringify(report, null, 2));
  } else {
    for (const line of render(report)) io.out(line);
  }
  return report.overallStatus === 'healthy' ? 0 : 1;
}

if (require.main === module) {
  try {
    process.exitCode = runValidate(process.argv.slice(2));
  } catch (error) {
    logger.error('Marker validation crashed', { error: serializeError(error) });
    process.exitCode = 1;
  }
}
