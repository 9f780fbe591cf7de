// Embeddable SVG disposition badge: "imagegate | 85/100"

import type { Decision, EvaluationReport } from '@imagegate/core';

const COLORS: Record<Decision, string> = {
  'auto-approve':       '#44cc11',
  'needs-human-review': '#dfb317',
  'auto-reject':        '#e05d44',
};

// XML escape helper — prevents XSS in SVG string templates
export function escapeXml(s: string): string {
  return s
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}

export function renderBadge(report: EvaluationReport): string {
  const color  = COLORS[report.decision];
  const label  = escapeXml('imagegate');
  const value  = escapeXml(`${report.total_score}/${report.max_score}`);
  const title  = escapeXml(`${report.image}: ${report.decision}`);
  const labelW = 70;
  const valueW = 54;
  const totalW = labelW + valueW;

  return `<svg xmlns="http://www.w3.org/2000/svg" width="${totalW}" height="20" role="img" aria-label="${label}: ${value}">
  <title>${title}</title>
  <linearGradient id="s" x2="0" y2="100%">
    <stop offset="0" stop-color="#bbb" stop-opacity=".1"/>
    <stop offset="1" stop-opacity=".1"/>
  </linearGradient>
  <clipPath id="r"><rect width="${totalW}" height="20" rx="3" fill="#fff"/></clipPath>
  <g clip-path="url(#r)">
    <rect width="${labelW}" height="20" fill="#555"/>
    <rect x="${labelW}" width="${valueW}" height="20" fill="${color}"/>
    <rect width="${totalW}" height="20" fill="url(#s)"/>
  </g>
  <g fill="#fff" text-anchor="middle" font-family="DejaVu Sans,Verdana,Geneva,sans-serif" font-size="110" transform="scale(.1)">
    <text aria-hidden="true" x="${labelW * 5}" y="150" fill="#010101" fill-opacity=".3" textLength="${(labelW - 10) * 10}" lengthAdjust="spacing">${label}</text>
    <text x="${labelW * 5}" y="140" textLength="${(labelW - 10) * 10}" lengthAdjust="spacing">${label}</text>
    <text aria-hidden="true" x="${(labelW + valueW / 2) * 10}" y="150" fill="#010101" fill-opacity=".3" textLength="${(valueW - 10) * 10}" lengthAdjust="spacing">${value}</text>
    <text x="${(labelW + valueW / 2) * 10}" y="140" textLength="${(valueW - 10) * 10}" lengthAdjust="spacing">${value}</text>
  </g>
</svg>`;
}
