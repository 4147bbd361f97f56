import {
  MessageProcessingError,
  ValidationError,
} from '../../common/errors/application.errors';
import {
  InboundMessage,
  MAX_EXTERNAL_ID_LENGTH,
  MAX_TEXT_LENGTH,
  NormalizedMessage,
} from '../contracts';

/**
 * The CXone inbound body is deliberately loose: undocumented variants put
 * the openid and text in different places. It is read as an untyped
 * record through ordered extraction rules rather than a fixed DTO.
 */
export type CxonePayload = Record<string, unknown>;

interface ExtractionRule {
  path: readonly string[];
  /** Accept numbers and stringify them (openid fields only). */
  coerce?: boolean;
}

// First match wins. The order is part of the contract with CXone.
const EXTERNAL_ID_RULES: readonly ExtractionRule[] = [
  { path: ['thread', 'idOnExternalPlatform'] },
  { path: ['recipient', 'idOnExternalPlatform'] },
  { path: ['externalId'] },
  { path: ['metadata', 'openid'], coerce: true },
  { path: ['openid'], coerce: true },
];

const TEXT_RULES: readonly ExtractionRule[] = [
  { path: ['message', 'text'] },
  { path: ['message', 'content'] },
  { path: ['text'] },
  { path: ['content'] },
];

interface FieldRule {
  path: readonly string[];
  kind: 'object' | 'string' | 'openid';
  maxLength?: number;
}

const FIELD_RULES: readonly FieldRule[] = [
  { path: ['thread'], kind: 'object' },
  {
    path: ['thread', 'idOnExternalPlatform'],
    kind: 'string',
    maxLength: MAX_EXTERNAL_ID_LENGTH,
  },
  { path: ['recipient'], kind: 'object' },
  { path: ['recipient', 'idOnExternalPlatform'], kind: 'string' },
  { path: ['externalId'], kind: 'string' },
  { path: ['metadata'], kind: 'object' },
  {
    path: ['metadata', 'openid'],
    kind: 'openid',
    maxLength: MAX_EXTERNAL_ID_LENGTH,
  },
  { path: ['openid'], kind: 'openid', maxLength: MAX_EXTERNAL_ID_LENGTH },
  { path: ['message'], kind: 'object' },
  { path: ['message', 'text'], kind: 'string', maxLength: MAX_TEXT_LENGTH },
  { path: ['message', 'content'], kind: 'string', maxLength: MAX_TEXT_LENGTH },
  { path: ['text'], kind: 'string', maxLength: MAX_TEXT_LENGTH },
  { path: ['content'], kind: 'string', maxLength: MAX_TEXT_LENGTH },
];

export interface FieldViolation {
  field: string;
  problem: string;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readPath(payload: CxonePayload, path: readonly string[]): unknown {
  let current: unknown = payload;
  for (const segment of path) {
    if (!isRecord(current)) return undefined;
    current = current[segment];
  }
  return current;
}

function checkField(value: unknown, rule: FieldRule): string | null {
  if (value === undefined || value === null) return null;

  switch (rule.kind) {
    case 'object':
      return isRecord(value) ? null : 'must be an object';
    case 'string':
      if (typeof value !== 'string') return 'must be a string';
      break;
    case 'openid':
      if (typeof value !== 'string' && typeof value !== 'number') {
        return 'must be a string or a number';
      }
      break;
  }

  if (rule.maxLength !== undefined && String(value).length > rule.maxLength) {
    return `must be ${rule.maxLength} characters or less`;
  }
  return null;
}

/**
 * Checks shape and size limits of a CXone inbound body. Unknown fields
 * are allowed.
 *
 * @throws ValidationError listing every offending field.
 */
export function validateCxonePayload(payload: unknown): CxonePayload {
  if (!isRecord(payload)) {
    throw new ValidationError('Invalid request payload', {
      fields: [{ field: '(body)', problem: 'must be a JSON object' }],
    });
  }

  const violations: FieldViolation[] = [];
  for (const rule of FIELD_RULES) {
    const problem = checkField(readPath(payload, rule.path), rule);
    if (problem) {
      violations.push({ field: rule.path.join('.'), problem });
    }
  }

  if (violations.length > 0) {
    throw new ValidationError('Invalid request payload', {
      fields: violations,
    });
  }
  return payload;
}

function firstMatch(
  payload: CxonePayload,
  rules: readonly ExtractionRule[],
): string | undefined {
  for (const rule of rules) {
    const value = readPath(payload, rule.path);
    if (typeof value === 'string' && value !== '') return value;
    if (rule.coerce && typeof value === 'number' && value !== 0) {
      return String(value);
    }
  }
  return undefined;
}

export function extractExternalId(payload: CxonePayload): string | undefined {
  return firstMatch(payload, EXTERNAL_ID_RULES);
}

export function extractText(payload: CxonePayload): string | undefined {
  return firstMatch(payload, TEXT_RULES);
}

/**
 * Validates a CXone body and reduces it to the (externalId, text) pair.
 *
 * @throws ValidationError on shape/size violations (400)
 * @throws MessageProcessingError when either value cannot be found (422)
 */
export function normalizeCxonePayload(payload: unknown): NormalizedMessage {
  const body = validateCxonePayload(payload);

  const externalId = extractExternalId(body);
  if (!externalId) {
    throw new MessageProcessingError(
      'Could not extract openid from payload',
      { payloadKeys: Object.keys(body) },
    );
  }

  const text = extractText(body);
  if (!text) {
    throw new MessageProcessingError(
      'Could not extract message text from payload',
      { payloadKeys: Object.keys(body) },
    );
  }

  return { externalId, text };
}

/** WeChat side: null means "acknowledge and drop". */
export function normalizeWeChatMessage(
  msg: InboundMessage,
): NormalizedMessage | null {
  if (!msg.sourceId || !msg.content) return null;
  return { externalId: msg.sourceId, text: msg.content };
}

/**
 * Local checks every outbound adapter runs before touching the network.
 *
 * @throws MessageProcessingError
 */
export function assertDeliverable(externalId: string, text: string): void {
  if (!externalId) {
    throw new MessageProcessingError('openid is required');
  }
  if (!text) {
    throw new MessageProcessingError('message text is required');
  }
  if (text.length > MAX_TEXT_LENGTH) {
    throw new MessageProcessingError(
      `message text exceeds ${MAX_TEXT_LENGTH} characters`,
      { length: text.length },
    );
  }
}
