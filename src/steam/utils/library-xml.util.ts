import { XMLParser } from 'fast-xml-parser';
import { AppId } from '../../types/steam.types';

type XmlNode = Record<string, unknown>;

function asNode(value: unknown): XmlNode | undefined {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
    ? Object.fromEntries(Object.entries(value))
    : undefined;
}

function asText(value: unknown): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') {
    return String(value);
  }
  return '';
}

/** CDATA 래퍼가 문자 그대로 남아 있는 경우 제거 */
export function stripCdata(value: string): string {
  return value.replace(/<!\[CDATA\[/g, '').replace(/\]\]>/g, '').trim();
}

export class LibraryXmlError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'LibraryXmlError';
  }
}

/**
 * 커뮤니티 라이브러리 XML (`/games?tab=all&xml=1`) → AppID → 이름
 * 원본 순서를 유지하며, 빈 라이브러리는 빈 Map
 */
export function parseLibraryXml(xml: string): Map<AppId, string> {
  const parser = new XMLParser({
    ignoreAttributes: true,
    parseTagValue: false,
    trimValues: true,
    isArray: (tagName) => tagName === 'game',
  });

  const parsed = asNode(parser.parse(xml));
  const errorNode = asNode(parsed?.response);
  if (errorNode) {
    throw new LibraryXmlError(
      stripCdata(asText(errorNode.error)) || 'Steam profile returned an error response',
    );
  }

  const gamesList = asNode(parsed?.gamesList);
  if (!gamesList) {
    throw new LibraryXmlError('Library response has no gamesList element');
  }
  const listError = stripCdata(asText(gamesList.error));
  if (listError) {
    throw new LibraryXmlError(listError);
  }

  const gameNodes = asNode(gamesList.games)?.game;
  const entries: unknown[] = Array.isArray(gameNodes) ? gameNodes : [];

  const library = new Map<AppId, string>();
  for (const entry of entries) {
    const node = asNode(entry);
    const appId = asText(node?.appID).trim();
    if (!/^\d+$/.test(appId)) continue;
    library.set(appId, stripCdata(asText(node?.name)));
  }
  return library;
}
