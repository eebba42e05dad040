import { ShareSlices } from '../aggregate/aggregate';

export type PieSlice = {
  label: string;
  value: number;
  percent: number;
  color: string;
  // SVG path data, also accepted by PDF drawing
  path: string;
  labelX: number;
  labelY: number;
};

export type PieGeometry = {
  cx: number;
  cy: number;
  radius: number;
};

const PALETTE = [
  '#1f77b4',
  '#ff7f0e',
  '#2ca02c',
  '#d62728',
  '#9467bd',
  '#8c564b',
  '#e377c2',
  '#7f7f7f',
  '#bcbd22',
  '#17becf',
];

const round = (n: number) => Math.round(n * 100) / 100;

function pointAt(geometry: PieGeometry, angle: number, radius: number = geometry.radius): [number, number] {
  return [round(geometry.cx + radius * Math.cos(angle)), round(geometry.cy + radius * Math.sin(angle))];
}

function slicePath(geometry: PieGeometry, start: number, end: number): string {
  const { cx, cy, radius } = geometry;
  if (end - start >= 2 * Math.PI - 1e-9) {
    // A single arc cannot close on itself
    return [
      `M ${round(cx - radius)} ${round(cy)}`,
      `A ${radius} ${radius} 0 1 1 ${round(cx + radius)} ${round(cy)}`,
      `A ${radius} ${radius} 0 1 1 ${round(cx - radius)} ${round(cy)}`,
      'Z',
    ].join(' ');
  }
  const [x1, y1] = pointAt(geometry, start);
  const [x2, y2] = pointAt(geometry, end);
  const largeArc = end - start > Math.PI ? 1 : 0;
  return `M ${cx} ${cy} L ${x1} ${y1} A ${radius} ${radius} 0 ${largeArc} 1 ${x2} ${y2} Z`;
}

/**
 * Lays out pie slices clockwise from twelve o'clock
 */
export function pieSlices(share: ShareSlices, geometry: PieGeometry): PieSlice[] {
  const total = share.values.reduce((sum, value) => sum + Math.max(0, value), 0);
  if (total <= 0) {
    return [];
  }
  let angle = -Math.PI / 2;
  return share.labels.map((label, i) => {
    const value = Math.max(0, share.values[i] ?? 0);
    const sweep = (value / total) * 2 * Math.PI;
    const start = angle;
    angle += sweep;
    const [labelX, labelY] = pointAt(geometry, start + sweep / 2, geometry.radius * 0.65);
    return {
      label,
      value,
      percent: (value / total) * 100,
      color: PALETTE[i % PALETTE.length],
      path: slicePath(geometry, start, angle),
      labelX,
      labelY,
    };
  });
}

export function escapeXml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}

const SVG_WIDTH = 640;
const SVG_HEIGHT = 400;
const SVG_GEOMETRY: PieGeometry = { cx: 200, cy: 210, radius: 150 };

/**
 * Renders the category-share pie as a standalone SVG document
 */
export function renderPieSvg(share: ShareSlices, title: string): string {
  const slices = pieSlices(share, SVG_GEOMETRY);
  const parts = [
    `<svg xmlns="http://www.w3.org/2000/svg" width="${SVG_WIDTH}" height="${SVG_HEIGHT}" viewBox="0 0 ${SVG_WIDTH} ${SVG_HEIGHT}">`,
    `<rect width="${SVG_WIDTH}" height="${SVG_HEIGHT}" fill="#ffffff"/>`,
    `<text x="${SVG_WIDTH / 2}" y="30" font-family="Helvetica, Arial, sans-serif" font-size="18" text-anchor="middle">${escapeXml(title)}</text>`,
  ];
  slices.forEach((slice, i) => {
    parts.push(`<path d="${slice.path}" fill="${slice.color}" stroke="#ffffff" stroke-width="1"/>`);
    parts.push(
      `<text x="${slice.labelX}" y="${slice.labelY}" font-family="Helvetica, Arial, sans-serif" font-size="11" text-anchor="middle">${slice.percent.toFixed(1)}%</text>`,
    );
    const legendY = 80 + i * 24;
    parts.push(`<rect x="390" y="${legendY - 11}" width="14" height="14" fill="${slice.color}"/>`);
    parts.push(
      `<text x="412" y="${legendY}" font-family="Helvetica, Arial, sans-serif" font-size="13">${escapeXml(slice.label)}</text>`,
    );
  });
  parts.push('</svg>');
  return parts.join('\n') + '\n';
}
