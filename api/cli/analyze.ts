#!/usr/bin/env node
// api/cli/analyze.ts - Analyze a chat transcript file against the marker taxonomy
import * as fs from 'fs';
import * as path from 'path';
import { logger } from '../_lib/logger';
import { AppError, serializeError } from '../_lib/errors';
import { loadMarkerSetFromFile } from '../_lib/services/markerLoader';
import { compile } from '../_lib/services/patternCompiler';
import { parseTranscriptWithFormat } from '../_lib/services/transcriptParser';
import { analyzeTranscript } from '../_lib/services/transcriptAnalysis';
import { formatReport } from '../_lib/services/report';
import { parseArgs, processIO, type CliIO } from './args';
import type { ScoringMode } from '../_lib/types/markerTypes';

const USAGE = 'Usage: spiral-markers <transcript.txt> [--json] [--markers <file.json>] [--mode presence|frequency]';

function parseMode(value: string | undefined): ScoringMode | undefined {
  if (value === undefined) return undefined;
  if (value === 'presence' || value === 'frequency') return value;
  throw new AppError(`Unknown scoring mode "${value}"`, 'ERR_USAGE');
}

export function runAnalyze(argv: readonly string[], io: CliIO = processIO): number {
  logger.logToStderr();
  const { positional, flags } = parseArgs(argv, ['json', 'help']);
  const [file] = positional;

  if (flags.help || !file) {
    io.err(USAGE);
    return flags.help ? 0 : 1;
  }

  try {
    const mode = parseMode(flags.mode);
    const markerSet = loadMarkerSetFromFile(flags.markers);
    const compiled = compile(markerSet);

    let content: string;
    try {
      content = fs.readFileSync(file, 'utf-8');
    } catch (error) {
      throw new AppError(`Cannot read transcript ${file}`, 'ERR_INPUT', true, { cause: error });
    }

    const { format, units } = parseTranscriptWithFormat(content);
    const analysis = analyzeTranscript(units, compiled, { mode });

    if (flags.json) {
      io.out(JSON.stringify({
        file: path.basename(file),
        format,
        units: analysis.units.map(u => ({
          index: u.index,
          line: u.line,
          speaker: u.speaker,
          text: u.text,
          scores: u.score.scores,
          intensity: u.intensity,
        })),
        emotionalDrift: analysis.emotionalDrift,
        densityEvents: analysis.densityEvents,
        profile: analysis.profile,
      }, null, 2));
    } else {
      io.out(formatReport(analysis, { title: path.basename(file) }));
    }
    return 0;
  } catch (error) {
    logger.error('Transcript analysis failed', { file, error: serializeError(error) });
    io.err(error instanceof Error ? error.message : String(error));
    return 1;
  }
}

if (require.main === module) {
  process.exitCode = runAnalyze(process.argv.slice(2));
}
