/**
 * License server XML envelope
 *
 * Success format
 * ```xml
 * <fps>
 *    <checksum>82033743d5c0</checksum>
 *    <version>1.2.3.400</version>
 *    <hostname>host.example.com</hostname>
 *    <cert>MIIExzCCA6+gAwIBAgIIVRMcpsYSxcIwDQYJKoZIhvcNAQEFBQAwfzELMAkGA1UE</cert>
 * </fps>
 * ```
 * The content key context response is identical with `<ckc>` in place of `<cert>`.
 *
 * Error format
 * ```xml
 * <error>
 *    <checksum>82033743d5c0</checksum>
 *    <version>1.2.3.400</version>
 *    <hostname>Some host</hostname>
 *    <code>500</code>
 *    <message>Error message</message>
 * </error>
 * ```
 */

import { DOMParser } from '@xmldom/xmldom';
import { decodeBase64Permissive } from './base64.js';

export type EnvelopePayloadTag = 'cert' | 'ckc';

export interface EnvelopeMetadata {
  checksum?: string;
  version?: string;
  hostname?: string;
}

export type LicenseEnvelope =
  /** `data` is undefined when the payload is not valid base64 */
  | { type: 'success'; data: Uint8Array | undefined; metadata: EnvelopeMetadata }
  | { type: 'serverError'; code: number; message: string; metadata: EnvelopeMetadata }
  | { type: 'parseFailure'; reason: string };

/** Minimal element surface we read; satisfied by xmldom's Element */
interface XmlElement {
  readonly tagName: string;
  readonly textContent: string | null;
  readonly childNodes: ArrayLike<XmlNode>;
}

interface XmlNode {
  readonly nodeType: number;
}

const ELEMENT_NODE = 1;
const INTEGER = /^[+-]?\d+$/;

function isElement(node: XmlNode): node is XmlNode & XmlElement {
  return node.nodeType === ELEMENT_NODE;
}

/**
 * First direct child element with the given name.
 */
function child(parent: XmlElement, name: string): XmlElement | undefined {
  for (let i = 0; i < parent.childNodes.length; i++) {
    const node = parent.childNodes[i];
    if (isElement(node) && node.tagName === name) {
      return node;
    }
  }
  return undefined;
}

function childText(parent: XmlElement, name: string): string | undefined {
  const element = child(parent, name);
  return element ? (element.textContent ?? '') : undefined;
}

function metadataOf(root: XmlElement): EnvelopeMetadata {
  const metadata: EnvelopeMetadata = {};
  const checksum = childText(root, 'checksum');
  const version = childText(root, 'version');
  const hostname = childText(root, 'hostname');
  if (checksum !== undefined) metadata.checksum = checksum.trim();
  if (version !== undefined) metadata.version = version.trim();
  if (hostname !== undefined) metadata.hostname = hostname.trim();
  return metadata;
}

function parseDocument(xml: string): { root?: XmlElement; errors: string[] } {
  const errors: string[] = [];
  const collect = (msg: string) => {
    errors.push(msg);
  };
  // warnings leave the document well-formed
  const parser = new DOMParser({
    errorHandler: { warning: () => undefined, error: collect, fatalError: collect },
  });

  try {
    const doc = parser.parseFromString(xml, 'text/xml');
    return { root: doc?.documentElement ?? undefined, errors };
  } catch (error) {
    errors.push(error instanceof Error ? error.message : String(error));
    return { errors };
  }
}

/**
 * Parse a license server response body.
 *
 * Pure: no I/O, no throwing. The payload tag selects which success element is
 * read (`cert` for the application certificate, `ckc` for the content key
 * context).
 */
export function parseLicenseEnvelope(
  body: string | Uint8Array,
  payloadTag: EnvelopePayloadTag
): LicenseEnvelope {
  const xml = typeof body === 'string' ? body : new TextDecoder().decode(body);
  if (xml.trim().length === 0) {
    return { type: 'parseFailure', reason: 'empty body' };
  }

  const { root, errors } = parseDocument(xml);
  if (errors.length > 0) {
    return { type: 'parseFailure', reason: `malformed XML: ${errors[0]}` };
  }
  if (!root) {
    return { type: 'parseFailure', reason: 'no root element' };
  }

  if (root.tagName === 'fps') {
    const payload = childText(root, payloadTag);
    if (payload === undefined) {
      return { type: 'parseFailure', reason: `<fps> has no <${payloadTag}>` };
    }
    return { type: 'success', data: decodeBase64Permissive(payload), metadata: metadataOf(root) };
  }

  if (root.tagName === 'error') {
    const codeText = childText(root, 'code')?.trim();
    const message = childText(root, 'message');
    if (codeText === undefined || !INTEGER.test(codeText) || message === undefined) {
      return { type: 'parseFailure', reason: '<error> lacks an integer <code> or a <message>' };
    }
    return {
      type: 'serverError',
      code: Number.parseInt(codeText, 10),
      message,
      metadata: metadataOf(root),
    };
  }

  return { type: 'parseFailure', reason: `unexpected root <${root.tagName}>` };
}
