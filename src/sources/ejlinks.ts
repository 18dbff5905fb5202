/**
 * EJLinks payload
 *
 * The ping reply carries the stream links as base64 JSON with two characters
 * spliced in at offset 10 and the eleventh character moved to the end.
 */

export interface EJLinks {
  MP4Link?: string;
  HLSLink?: string;
}

export function decodeEJLinks(encoded: string): EJLinks {
  if (encoded.length < 13) {
    throw new Error(`EJLinks payload too short (${encoded.length} chars)`);
  }

  const last = encoded.length - 1;
  const base64 = encoded.slice(0, 10) + encoded[last] + encoded.slice(12, last);
  const parsed: unknown = JSON.parse(Buffer.from(base64, 'base64').toString('utf-8'));

  if (typeof parsed !== 'object' || parsed === null) {
    throw new Error('EJLinks payload is not an object');
  }

  const links: EJLinks = {};
  if ('MP4Link' in parsed && typeof parsed.MP4Link === 'string') links.MP4Link = parsed.MP4Link;
  if ('HLSLink' in parsed && typeof parsed.HLSLink === 'string') links.HLSLink = parsed.HLSLink;
  return links;
}
