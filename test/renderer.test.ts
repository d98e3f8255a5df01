import { describe, it, expect } from 'vitest';
import { renderSvg, escapeXml, jsonString, jsonStringArray } from '../src/renderer.js';
import type { SceneLayout } from '../src/layout.js';
import type { HexagonDescriptor } from '../src/types.js';

const HAS_DATA: HexagonDescriptor = {
  coordinate: { hex1: 27, hex2: 11 },
  region: 'ME',
  side: 'R',
  state: 'has_data',
  x: 15.456,
  y: 20,
  value: 400,
  color: '#a50f15',
  tooltip: 'Column: 27, 11\nSynapse count: 400\nROI: ME (R)',
  layerColors: ['#fc9272', '#ef6548'],
  layerTooltips: ['4\nROI: ME1', '6\nROI: ME2'],
};

const NO_DATA: HexagonDescriptor = {
  ...HAS_DATA,
  coordinate: { hex1: 26, hex2: 10 },
  state: 'exists_no_data',
  x: 5,
  value: 0,
  color: '#ffffff',
  tooltip: 'Column: 26, 10\nSynapse count: 0\nROI: ME (R)',
  layerColors: [],
  layerTooltips: [],
};

const ABSENT: HexagonDescriptor = {
  ...NO_DATA,
  coordinate: { hex1: 28, hex2: 12 },
  state: 'not_in_region',
  x: 25,
  color: '#999999',
  tooltip: 'Column: 28, 12\nColumn not identified in ME (R)',
};

function scene(hexagons: HexagonDescriptor[], withLegend = true): SceneLayout {
  return {
    width: 112,
    height: 80,
    hexPoints: '6.00,0.00 3.00,5.20 -3.00,5.20 -6.00,0.00 -3.00,-5.20 3.00,-5.20',
    title: { text: 'ME Synapses (All Columns)', x: 56, y: 22 },
    subtitle: { text: 'T4<a> (R)', x: 56, y: 36 },
    hexagons,
    ...(withLegend ? {
      legend: {
        x: 45, y: 10, width: 12, height: 60, binHeight: 12, labelX: 61,
        title: 'Total Synapses',
        values: [0, 80, 160, 240, 320, 400],
        colors: ['#fee5d9', '#fcbba1', '#fc9272', '#ef6548', '#a50f15'],
      },
    } : {}),
  };
}

describe('jsonString', () => {
  it('escapes quotes, backslashes and control characters', () => {
    expect(jsonString('a "b"\\c\nd\te')).toBe('"a \\"b\\"\\\\c\\nd\\te"');
  });

  it('writes non-ASCII as \\u escapes', () => {
    expect(jsonString('café')).toBe('"caf\\u00e9"');
    expect(jsonString('\u{1F600}')).toBe('"\\ud83d\\ude00"');
    expect(jsonString('\x7f')).toBe('"\\u007f"');
  });
});

describe('jsonStringArray', () => {
  it('separates items with a comma and a space', () => {
    expect(jsonStringArray(['#fff', '#000'])).toBe('["#fff", "#000"]');
    expect(jsonStringArray([])).toBe('[]');
  });
});

describe('escapeXml', () => {
  it('escapes markup characters', () => {
    expect(escapeXml(`<a href="x">Tom & 'Jerry'</a>`))
      .toBe('&lt;a href=&quot;x&quot;&gt;Tom &amp; &#39;Jerry&#39;&lt;/a&gt;');
  });
});

describe('renderSvg', () => {
  it('emits a standalone document sized to the scene', () => {
    const svg = renderSvg(scene([HAS_DATA]));
    expect(svg.startsWith('<svg xmlns="http://www.w3.org/2000/svg" width="112" height="80" viewBox="0 0 112 80">')).toBe(true);
    expect(svg.endsWith('</svg>')).toBe(true);
  });

  it('writes one hexagon group per descriptor', () => {
    const svg = renderSvg(scene([NO_DATA, HAS_DATA, ABSENT]));
    expect(svg.match(/<g class="hexagon"/g)).toHaveLength(3);
  });

  it('embeds tooltip metadata as index-aligned JSON attributes', () => {
    const svg = renderSvg(scene([HAS_DATA]));
    const line = svg.split('\n').find(l => l.startsWith('<g class="hexagon"'));
    expect(line).toBe(
      '<g class="hexagon" transform="translate(15.46,20)" data-state="has_data" data-region="ME" data-side="R"' +
      ' data-hex1="27" data-hex2="11"' +
      ` base-title='"Column: 27, 11\\nSynapse count: 400\\nROI: ME (R)"'` +
      ` layer-colors='["#fc9272", "#ef6548"]' tooltip-layers='["4\\nROI: ME1", "6\\nROI: ME2"]'>` +
      '<polygon points="6.00,0.00 3.00,5.20 -3.00,5.20 -6.00,0.00 -3.00,-5.20 3.00,-5.20" fill="#a50f15" stroke="none"/>' +
      '<title>Column: 27, 11',
    );
  });

  it('borders only hexagons that exist without data', () => {
    const svg = renderSvg(scene([NO_DATA, ABSENT]));
    expect(svg).toContain('fill="#ffffff" stroke="#e0e0e0" stroke-width="0.5"/>');
    expect(svg).toContain('fill="#999999" stroke="none"/>');
    expect(svg.match(/stroke-width="0\.5"\/><title>/g)).toHaveLength(1);
  });

  it('writes empty layer arrays for hexagons without sublayers', () => {
    const svg = renderSvg(scene([ABSENT]));
    expect(svg).toContain(`layer-colors='[]' tooltip-layers='[]'`);
  });

  it('escapes apostrophes inside single-quoted attributes', () => {
    const svg = renderSvg(scene([{ ...HAS_DATA, tooltip: "it's <here> & there" }]));
    expect(svg).toContain(`base-title='"it&#39;s &lt;here> &amp; there"'`);
  });

  it('escapes title text', () => {
    const svg = renderSvg(scene([HAS_DATA]));
    expect(svg).toContain('<text class="subtitle" x="56" y="36" text-anchor="middle">T4&lt;a&gt; (R)</text>');
  });

  it('draws the legend bins from the bottom up', () => {
    const svg = renderSvg(scene([HAS_DATA]));
    expect(svg).toContain('<rect x="45" y="58" width="12" height="12" fill="#fee5d9"');
    expect(svg).toContain('<rect x="45" y="10" width="12" height="12" fill="#a50f15"');
    expect(svg).toContain('<text class="legend-label" x="61" y="73" text-anchor="start">0</text>');
    expect(svg).toContain('<text class="legend-label" x="61" y="13" text-anchor="start">400</text>');
    expect(svg).toContain('>Total Synapses</text>');
  });

  it('omits the legend when the layout has none', () => {
    const svg = renderSvg(scene([ABSENT], false));
    expect(svg).not.toContain('class="legend"');
  });

  it('accepts a custom border colour', () => {
    const svg = renderSvg(scene([NO_DATA]), { border: '#123456' });
    expect(svg).toContain('stroke="#123456"');
  });
});
