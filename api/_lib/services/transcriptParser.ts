// api/_lib/services/transcriptParser.ts
// Recognizes common chat export layouts and splits them into text units

import { withModule } from '../logger';
import type { TranscriptUnit } from '../types/markerTypes';

const log = withModule('transcriptParser');

export type TranscriptFormat = 'whatsapp' | 'discord' | 'colon' | 'markdown' | 'speaker-blocks' | 'lines';

export interface ParsedTranscript {
  format: TranscriptFormat;
  units: TranscriptUnit[];
}

type FormatParser = (lines: string[]) => TranscriptUnit[] | null;

// Share of lines a line-oriented format must recognize before it is trusted
const MIN_RECOGNIZED_SHARE = 0.3;
const MAX_SPEAKER_LENGTH = 40;

const SPEAKER_ALIASES: Record<string, string> = {
  chatgpt: 'AI', gpt: 'AI', claude: 'AI', narion: 'AI',
  bot: 'AI', assistant: 'AI', ai: 'AI', ki: 'AI',
  ich: 'User', user: 'User', human: 'User',
  you: 'User', du: 'User', nutzer: 'User',
};

const SPEAKER_PREFIXES = ['ich:', 'user:', 'ai:', 'bot:', 'system:', 'narion:', 'claude:', 'gpt:'];

export function normalizeSpeaker(speaker: string): string {
  const key = speaker.toLowerCase().trim();
  const alias = SPEAKER_ALIASES[key];
  if (alias) return alias;
  return key.replace(/(^|[\s_-])(\p{L})/gu, (_, sep: string, ch: string) => sep + ch.toUpperCase());
}

function recognizedEnough(parsed: TranscriptUnit[], lines: string[]): TranscriptUnit[] | null {
  return parsed.length > lines.length * MIN_RECOGNIZED_SHARE ? parsed : null;
}

const WHATSAPP_LINE = /^\[(\d{2}\.\d{2}\.\d{2,4},\s\d{2}:\d{2}(?::\d{2})?)\]\s(.+?):\s(.+)$/;

const parseWhatsApp: FormatParser = (lines) => {
  const parsed: TranscriptUnit[] = [];
  lines.forEach((line, i) => {
    const m = WHATSAPP_LINE.exec(line);
    if (!m) return;
    parsed.push({ line: i + 1, speaker: normalizeSpeaker(m[2]), text: m[3].trim(), timestamp: m[1] });
  });
  return recognizedEnough(parsed, lines);
};

const DISCORD_LINE = /^(\d{2}:\d{2})\s+(\S+)\s+(.+)$/;

const parseDiscord: FormatParser = (lines) => {
  const parsed: TranscriptUnit[] = [];
  lines.forEach((line, i) => {
    const m = DISCORD_LINE.exec(line);
    if (!m) return;
    parsed.push({ line: i + 1, speaker: normalizeSpeaker(m[2].replace(/:$/, '')), text: m[3].trim(), timestamp: m[1] });
  });
  return recognizedEnough(parsed, lines);
};

const parseColon: FormatParser = (lines) => {
  const parsed: TranscriptUnit[] = [];
  lines.forEach((line, i) => {
    if (/^https?:/i.test(line)) return;
    const sep = line.indexOf(':');
    if (sep <= 0) return;
    const speaker = line.slice(0, sep).trim();
    const text = line.slice(sep + 1).trim();
    if (!speaker || !text || speaker.length > MAX_SPEAKER_LENGTH) return;
    parsed.push({ line: i + 1, speaker: normalizeSpeaker(speaker), text, timestamp: null });
  });
  return recognizedEnough(parsed, lines);
};

const parseMarkdown: FormatParser = (lines) => {
  const parsed: TranscriptUnit[] = [];
  let speaker = 'Unknown';
  let headers = 0;

  lines.forEach((line, i) => {
    if (line.startsWith('**') && line.endsWith('**') && line.length > 4) {
      speaker = normalizeSpeaker(line.slice(2, -2));
      headers++;
    } else if (line.startsWith('#')) {
      speaker = normalizeSpeaker(line.replace(/^#+/, ''));
      headers++;
    } else {
      parsed.push({ line: i + 1, speaker, text: line, timestamp: null });
    }
  });

  return headers > 0 && parsed.length > 0 ? parsed : null;
};

const parseSpeakerBlocks: FormatParser = (lines) => {
  const parsed: TranscriptUnit[] = [];
  let speaker = 'Unknown';
  let prefixed = 0;

  lines.forEach((raw, i) => {
    let line = raw;
    const prefix = SPEAKER_PREFIXES.find(p => line.toLowerCase().startsWith(p));
    if (prefix) {
      speaker = normalizeSpeaker(prefix.slice(0, -1));
      line = line.slice(prefix.length).trim();
      prefixed++;
    }
    if (line) parsed.push({ line: i + 1, speaker, text: line, timestamp: null });
  });

  return prefixed > 0 && parsed.length > 0 ? parsed : null;
};

// Most specific layouts first; a WhatsApp line would also pass the colon parser
const PARSERS: Array<[TranscriptFormat, FormatParser]> = [
  ['whatsapp', parseWhatsApp],
  ['discord', parseDiscord],
  ['colon', parseColon],
  ['markdown', parseMarkdown],
  ['speaker-blocks', parseSpeakerBlocks],
];

/**
 * Splits raw chat content into units. Blank lines are dropped first, so `line`
 * numbers count non-empty lines (1-based). Falls back to one unit per line.
 */
export function parseTranscriptWithFormat(content: string): ParsedTranscript {
  const lines = content.split(/\r?\n/).map(l => l.trim()).filter(l => l.length > 0);
  if (lines.length === 0) return { format: 'lines', units: [] };

  for (const [format, parser] of PARSERS) {
    const units = parser(lines);
    if (units && units.length > 0) {
      log.debug('Transcript format recognized', { format, units: units.length, lines: lines.length });
      return { format, units };
    }
  }

  return {
    format: 'lines',
    units: lines.map((text, i) => ({ line: i + 1, speaker: 'Unknown', text, timestamp: null })),
  };
}

export function parseTranscript(content: string): TranscriptUnit[] {
  return parseTranscriptWithFormat(content).units;
}
