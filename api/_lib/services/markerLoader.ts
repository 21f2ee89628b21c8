// api/_lib/services/markerLoader.ts
import * as fs from 'fs';
import * as path from 'path';
import { env } from '../env';
import { withModule } from '../logger';
import { ConfigError, formatZodError, type ConfigIssue } from '../errors';
import { markerConfigSchema, type RawPolarityBlock } from '../schemas/markerConfig';
import { deepFreeze } from '../utils/freeze';
import {
  CATEGORIES,
  isCategory,
  type Category,
  type CategoryMarkers,
  type MarkerGroup,
  type MarkerSet,
  type Polarity,
  type PolarityBlock,
} from '../types/markerTypes';

const log = withModule('markerLoader');

export const DEFAULT_MARKERS_FILE = 'spiral_markers.json';

// A "#" preceded by whitespace starts a human comment that runs to the end of the string
const INLINE_COMMENT = /\s+#.*$/s;

export function stripInlineComment(pattern: string): string {
  return pattern.replace(INLINE_COMMENT, '').trim();
}

// Tokens are regex fragments: letter case is kept so escapes like \S or \P{..} survive
function normalizeToken(token: string): string {
  return token.normalize('NFC').trim().replace(/\s+/g, ' ');
}

// Duplicate key: matching ignores case, so literals compare lowercased; escapes stay as written
function caseKey(marker: string): string {
  return marker.replace(/\\.|[^\\]+/gsu, part => (part.startsWith('\\') ? part : part.toLowerCase()));
}

// Drops repeats by caseKey, logging each one
function dedupe(markers: string[], context: Record<string, unknown>): string[] {
  const seen = new Set<string>();
  return markers.filter((marker) => {
    const key = caseKey(marker);
    if (seen.has(key)) {
      log.warn('Duplicate marker dropped', { ...context, marker });
      return false;
    }
    seen.add(key);
    return true;
  });
}

function buildBlock(
  category: Category,
  polarity: Polarity,
  raw: RawPolarityBlock,
  issues: ConfigIssue[]
): PolarityBlock {
  const basePath = `Spiral_Dynamics_Enhanced.${category}.${polarity === 'positive' ? 'Positive' : 'Negative'}`;

  const tokens: string[] = [];
  raw.tokens.forEach((token, i) => {
    const normalized = normalizeToken(token);
    if (!normalized) {
      issues.push({ path: `${basePath}.tokens.${i}`, message: 'token is blank' });
      return;
    }
    tokens.push(normalized);
  });

  const patterns: string[] = [];
  raw.patterns.forEach((pattern, i) => {
    const stripped = stripInlineComment(pattern.normalize('NFC'));
    if (!stripped) {
      issues.push({ path: `${basePath}.patterns.${i}`, message: 'pattern is empty once its comment is removed' });
      return;
    }
    patterns.push(stripped);
  });

  return {
    category,
    polarity,
    weight: raw.weight,
    tokens: dedupe(tokens, { category, polarity, kind: 'token' }),
    patterns: dedupe(patterns, { category, polarity, kind: 'pattern' }),
  };
}

/**
 * Validates a raw marker configuration and builds an immutable MarkerSet.
 * The input object is never modified.
 */
export function loadMarkerSet(raw: unknown): MarkerSet {
  const parsed = markerConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = formatZodError(parsed.error);
    log.error('Marker configuration failed validation', { issueCount: issues.length, issues: issues.slice(0, 10) });
    throw new ConfigError('Invalid marker configuration', issues, { cause: parsed.error });
  }

  const issues: ConfigIssue[] = [];
  const categories: CategoryMarkers[] = [];

  for (const [name, block] of Object.entries(parsed.data.Spiral_Dynamics_Enhanced)) {
    if (!isCategory(name)) {
      issues.push({
        path: `Spiral_Dynamics_Enhanced.${name}`,
        message: `unknown category (expected one of ${CATEGORIES.join(', ')})`,
      });
      continue;
    }
    categories.push({
      category: name,
      positive: buildBlock(name, 'positive', block.Positive, issues),
      negative: buildBlock(name, 'negative', block.Negative, issues),
    });
  }

  if (categories.length === 0 && issues.length === 0) {
    issues.push({ path: 'Spiral_Dynamics_Enhanced', message: 'at least one category is required' });
  }

  const driftGroups: MarkerGroup[] = [];
  for (const [name, entries] of Object.entries(parsed.data.Semantic_Drift ?? {})) {
    const patterns: string[] = [];
    entries.forEach((entry, e) => {
      entry.patterns.forEach((pattern, i) => {
        const stripped = stripInlineComment(pattern.normalize('NFC'));
        if (!stripped) {
          issues.push({ path: `Semantic_Drift.${name}.${e}.patterns.${i}`, message: 'pattern is empty once its comment is removed' });
          return;
        }
        patterns.push(stripped);
      });
    });
    driftGroups.push({ name, patterns: dedupe(patterns, { group: name, kind: 'pattern' }) });
  }

  if (issues.length > 0) {
    log.error('Marker configuration is inconsistent', { issueCount: issues.length, issues: issues.slice(0, 10) });
    throw new ConfigError('Invalid marker configuration', issues);
  }

  const markerSet: MarkerSet = {
    ...(parsed.data.version !== undefined ? { version: parsed.data.version } : {}),
    categories,
    driftGroups,
  };

  log.debug('Marker set loaded', {
    categories: categories.map(c => c.category),
    driftGroups: driftGroups.map(g => g.name),
  });

  return deepFreeze(markerSet);
}

/**
 * Finds the marker file: MARKERS_PATH when set, otherwise the first existing
 * data/ directory candidate (source tree, built dist/ tree, working directory).
 */
export function resolveMarkersPath(explicit?: string): string {
  if (explicit) return path.resolve(explicit);
  if (env.MARKERS_PATH) return path.resolve(env.MARKERS_PATH);

  const possiblePaths = [
    path.resolve(__dirname, '../../../data'),     // api/_lib/services/ -> data/
    path.resolve(__dirname, '../../../../data'),  // dist/api/_lib/services/ -> data/
    path.resolve(process.cwd(), 'data'),
  ].map(dir => path.join(dir, DEFAULT_MARKERS_FILE));

  const found = possiblePaths.find(p => fs.existsSync(p));
  if (!found) {
    log.warn('Marker file not found in any candidate path', { checked: possiblePaths });
    return possiblePaths[possiblePaths.length - 1];
  }
  return found;
}

export function loadMarkerSetFromFile(filePath?: string): MarkerSet {
  const resolved = resolveMarkersPath(filePath);
  log.info(`Loading marker set from ${resolved}`);

  let content: string;
  try {
    content = fs.readFileSync(resolved, 'utf-8');
  } catch (error) {
    throw new ConfigError(`Cannot read marker file ${resolved}`, [], { cause: error });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    throw new ConfigError(`Marker file ${resolved} is not valid JSON`, [], { cause: error });
  }

  return loadMarkerSet(raw);
}
