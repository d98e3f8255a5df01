/**
 * SVG serialization of a laid-out scene.
 * Positions arrive already translated; nothing here does coordinate math.
 */

import { LIGHT_GRAY, WHITE } from './color.js';
import type { SceneLayout } from './layout.js';
import type { HexagonDescriptor } from './types.js';

// ── Escaping ─────────────────────────────────────────────────────────────────

export function escapeXml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

/** Escape for a single-quoted attribute; double quotes stay literal. */
function escapeAttr(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/'/g, '&#39;');
}

const SHORT_ESCAPES: Record<string, string> = {
  '"': '\\"',
  '\\': '\\\\',
  '\n': '\\n',
  '\r': '\\r',
  '\t': '\\t',
  '\b': '\\b',
  '\f': '\\f',
};

/**
 * JSON string literal with every character outside printable ASCII written
 * as \uXXXX (UTF-16 code units, so astral characters become a pair).
 */
export function jsonString(text: string): string {
  let out = '"';
  for (let i = 0; i < text.length; i++) {
    const ch = text.charAt(i);
    const code = text.charCodeAt(i);
    const short = SHORT_ESCAPES[ch];
    if (short !== undefined) out += short;
    else if (code < 0x20 || code > 0x7e) out += `\\u${code.toString(16).padStart(4, '0')}`;
    else out += ch;
  }
  return out + '"';
}

/** JSON array of strings, items separated by ", ". */
export function jsonStringArray(items: readonly string[]): string {
  return `[${items.map(jsonString).join(', ')}]`;
}

// ── Numbers ──────────────────────────────────────────────────────────────────

function num(value: number): string {
  const rounded = Math.round(value * 100) / 100;
  return String(rounded === 0 ? 0 : rounded);
}

function legendLabel(value: number): string {
  if (Math.abs(value) >= 10) return String(Math.round(value));
  return num(value);
}

// ── Nodes ────────────────────────────────────────────────────────────────────

export interface RenderOptions {
  /** Stroke around EXISTS_NO_DATA hexagons. */
  border?: string;
  background?: string;
}

function hexagonNode(h: HexagonDescriptor, points: string, border: string): string {
  const stroke = h.state === 'exists_no_data'
    ? ` stroke="${border}" stroke-width="0.5"`
    : ' stroke="none"';
  return [
    `<g class="hexagon" transform="translate(${num(h.x)},${num(h.y)})"`,
    ` data-state="${h.state}" data-region="${escapeXml(h.region)}" data-side="${h.side}"`,
    ` data-hex1="${h.coordinate.hex1}" data-hex2="${h.coordinate.hex2}"`,
    ` base-title='${escapeAttr(jsonString(h.tooltip))}'`,
    ` layer-colors='${escapeAttr(jsonStringArray(h.layerColors))}'`,
    ` tooltip-layers='${escapeAttr(jsonStringArray(h.layerTooltips))}'>`,
    `<polygon points="${points}" fill="${h.color}"${stroke}/>`,
    `<title>${escapeXml(h.tooltip)}</title>`,
    '</g>',
  ].join('');
}

function legendNodes(scene: SceneLayout): string[] {
  const legend = scene.legend;
  if (!legend) return [];
  const anchor = legend.labelX < legend.x ? 'end' : 'start';
  const bottom = legend.y + legend.height;
  const lines = ['<g class="legend">'];
  lines.push(
    `<text class="legend-title" x="${num(legend.x + legend.width / 2)}" y="${num(legend.y - 6)}" text-anchor="middle">${escapeXml(legend.title)}</text>`,
  );
  legend.colors.forEach((color, i) => {
    const y = bottom - (i + 1) * legend.binHeight;
    lines.push(
      `<rect x="${num(legend.x)}" y="${num(y)}" width="${num(legend.width)}" height="${num(legend.binHeight)}" fill="${color}" stroke="${LIGHT_GRAY}" stroke-width="0.5"/>`,
    );
  });
  legend.values.forEach((value, i) => {
    const y = bottom - i * legend.binHeight;
    lines.push(
      `<text class="legend-label" x="${num(legend.labelX)}" y="${num(y + 3)}" text-anchor="${anchor}">${legendLabel(value)}</text>`,
    );
  });
  lines.push('</g>');
  return lines;
}

// ── Document ─────────────────────────────────────────────────────────────────

/**
 * Serialize a scene to a standalone SVG document.
 */
export function renderSvg(scene: SceneLayout, options: RenderOptions = {}): string {
  const border = options.border ?? LIGHT_GRAY;
  const background = options.background ?? WHITE;
  const width = num(scene.width);
  const height = num(scene.height);

  const lines = [
    `<svg xmlns="http://www.w3.org/2000/svg" width="${width}" height="${height}" viewBox="0 0 ${width} ${height}">`,
    '<style>text{font-family:Arial,sans-serif;fill:#333}.title{font-size:12px;font-weight:bold}.subtitle{font-size:10px}.legend-title,.legend-label{font-size:8px}</style>',
    `<rect class="background" x="0" y="0" width="${width}" height="${height}" fill="${background}"/>`,
  ];
  if (scene.title) {
    lines.push(`<text class="title" x="${num(scene.title.x)}" y="${num(scene.title.y)}" text-anchor="middle">${escapeXml(scene.title.text)}</text>`);
  }
  if (scene.subtitle) {
    lines.push(`<text class="subtitle" x="${num(scene.subtitle.x)}" y="${num(scene.subtitle.y)}" text-anchor="middle">${escapeXml(scene.subtitle.text)}</text>`);
  }
  lines.push('<g class="hexagons">');
  for (const h of scene.hexagons) lines.push(hexagonNode(h, scene.hexPoints, border));
  lines.push('</g>');
  lines.push(...legendNodes(scene));
  lines.push('</svg>');
  return lines.join('\n');
}
