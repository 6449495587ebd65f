const INNER_WIDTH = 62;
const BOX_WIDTH = 13;

export interface BannerOptions {
  title: string;
  platformsTitle: string;
  platforms: { windows: boolean; mac: boolean; linux: boolean };
  filterDenuvo: boolean;
}

function center(text: string, width: number): string {
  if (text.length >= width) return text.slice(0, width);
  const left = Math.floor((width - text.length) / 2);
  return ' '.repeat(left) + text + ' '.repeat(width - text.length - left);
}

function row(content: string): string {
  return `|${center(content, INNER_WIDTH)}|`;
}

/**
 * 시작 배너 (대상 플랫폼 Y/N + Denuvo 필터 상태)
 */
export function renderBanner(options: BannerOptions): string {
  const flag = (enabled: boolean) => (enabled ? 'Y' : 'N');
  const boxes = (cells: string[]) =>
    cells.map((cell) => `|${center(cell, BOX_WIDTH)}|`).join('    ');
  const edge = Array(3).fill(`+${'-'.repeat(BOX_WIDTH)}+`).join('    ');
  const { windows, mac, linux } = options.platforms;

  return [
    `+${'='.repeat(INNER_WIDTH)}+`,
    row(options.title),
    `|${'='.repeat(INNER_WIDTH)}|`,
    row(''),
    row(options.platformsTitle),
    row(''),
    row(edge),
    row(boxes(['WINDOWS', 'MAC', 'LINUX'])),
    row(boxes([flag(windows), flag(mac), flag(linux)])),
    row(edge),
    row(''),
    row(`DENUVO FILTERING: ${options.filterDenuvo ? 'ENABLED' : 'DISABLED'}`),
    `+${'='.repeat(INNER_WIDTH)}+`,
  ].join('\n');
}
