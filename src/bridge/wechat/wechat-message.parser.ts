import { XMLParser, XMLValidator } from 'fast-xml-parser';
import type { InboundMessage } from '../contracts';
import { isRecord } from '../normalizer/payload-normalizer';

export class WeChatMessageParseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'WeChatMessageParseError';
  }
}

const parser = new XMLParser({
  ignoreAttributes: true,
  ignoreDeclaration: true,
  parseTagValue: false,
  trimValues: true,
});

function readString(
  node: Record<string, unknown>,
  key: string,
): string | undefined {
  const value = node[key];
  return typeof value === 'string' && value !== '' ? value : undefined;
}

/** Parses a WeChat push body and returns its `<xml>` root element. */
export function parseXmlRoot(xml: string): Record<string, unknown> {
  const valid = XMLValidator.validate(xml);
  if (valid !== true) {
    throw new WeChatMessageParseError(
      `Malformed XML at line ${valid.err.line}: ${valid.err.msg}`,
    );
  }

  const doc: unknown = parser.parse(xml);
  const root = isRecord(doc) ? doc.xml : undefined;
  if (!isRecord(root)) {
    throw new WeChatMessageParseError('Missing <xml> root element');
  }
  return root;
}

export function parseWeChatMessage(xml: string): InboundMessage {
  const root = parseXmlRoot(xml);
  const type = readString(root, 'MsgType')?.toLowerCase() ?? 'unknown';
  const createTime = Number(readString(root, 'CreateTime'));

  return {
    type,
    sourceId: readString(root, 'FromUserName'),
    targetId: readString(root, 'ToUserName'),
    content: type === 'text' ? readString(root, 'Content') : undefined,
    id: readString(root, 'MsgId'),
    createTime: Number.isFinite(createTime) ? createTime : undefined,
    event: readString(root, 'Event'),
  };
}

/** `<Encrypt>` of an encrypted-mode push, or null for a plaintext body. */
export function extractEncryptedPayload(xml: string): string | null {
  return readString(parseXmlRoot(xml), 'Encrypt') ?? null;
}
