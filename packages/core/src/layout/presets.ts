import { ConfigError } from '../errors/index.js';
import type { LayoutOverrides, PageLayout } from '../types/index.js';
import { formatLength, parseLength } from '../utils/units.js';

export const LAYOUT_PRESET_NAMES = ['A4', 'B5', 'A5', 'royal', 'digest', 'academic'] as const;

export type LayoutPresetName = (typeof LAYOUT_PRESET_NAMES)[number];

function layout(
  paperHeight: number,
  paperWidth: number,
  marginTop: number,
  marginBottom: number,
  marginLeft: number,
  marginRight: number
): PageLayout {
  return { paperHeight, paperWidth, marginTop, marginBottom, marginLeft, marginRight };
}

const LAYOUT_PRESETS: Readonly<Record<LayoutPresetName, Readonly<PageLayout>>> = {
  A4: layout(16838, 11906, 1134, 1134, 1134, 1134),       // 2cm margins
  B5: layout(14173, 9978, 1701, 1417, 1134, 1134),        // 3cm, 2.5cm, 2cm, 2cm
  A5: layout(11906, 8391, 1151, 720, 567, 862),
  royal: layout(13262, 8827, 1152, 720, 864, 864),        // 15.57cm x 23.39cm
  digest: layout(12240, 7920, 1151, 720, 567, 862),       // 5.5in x 8.5in
  academic: layout(
    parseLength('24cm'),
    parseLength('17cm'),
    parseLength('2.8cm'),
    parseLength('2.5cm'),
    parseLength('2cm'),
    parseLength('2cm')
  ),
};

export const DEFAULT_LAYOUT: Readonly<PageLayout> = LAYOUT_PRESETS.A4;

const LAYOUT_FIELDS: ReadonlyArray<keyof PageLayout> = [
  'paperHeight',
  'paperWidth',
  'marginTop',
  'marginBottom',
  'marginLeft',
  'marginRight',
];

export function isLayoutPresetName(name: string): name is LayoutPresetName {
  return (LAYOUT_PRESET_NAMES as readonly string[]).includes(name);
}

/**
 * @throws ConfigError for an unknown preset name
 */
export function getLayoutPreset(name: string): PageLayout {
  if (!isLayoutPresetName(name)) {
    throw new ConfigError(
      `Layout preset "${name}" does not exist`,
      { preset: name },
      [`Valid presets: ${LAYOUT_PRESET_NAMES.join(', ')}`]
    );
  }
  return { ...LAYOUT_PRESETS[name] };
}

/**
 * Compute a full layout. Each field takes, in order of precedence, a set
 * override, the preset's value, or the current value.
 */
export function resolveLayout(
  current: PageLayout,
  preset?: string,
  overrides: LayoutOverrides = {}
): PageLayout {
  const base = preset ? getLayoutPreset(preset) : { ...current };
  const result = { ...base };

  for (const field of LAYOUT_FIELDS) {
    const raw = overrides[field];
    if (raw === undefined) continue;
    // Negative lengths, the unset marker included, keep the base value
    const twips = parseLength(raw);
    if (twips >= 0) {
      result[field] = twips;
    }
  }

  return result;
}

export function describeLayout(layout: PageLayout): string {
  const row = (label: string, twips: number) =>
    ` ${label}: ${twips} (${formatLength(twips, 'cm')})`;

  return [
    'Layout in twips:',
    row('Paper height', layout.paperHeight),
    row('Paper width', layout.paperWidth),
    row('Top margin', layout.marginTop),
    row('Bottom margin', layout.marginBottom),
    row('Left margin', layout.marginLeft),
    row('Right margin', layout.marginRight),
  ].join('\n');
}
