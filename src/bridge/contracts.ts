export const MAX_EXTERNAL_ID_LENGTH = 128;
export const MAX_TEXT_LENGTH = 10_000;
export const MAX_WEBHOOK_BODY_BYTES = 100_000;

/** Canonical pair every inbound event is reduced to before forwarding. */
export interface NormalizedMessage {
  externalId: string; // WeChat openid, CXone thread idOnExternalPlatform
  text: string;
}

/** WeChat message as parsed from the webhook XML. */
export interface InboundMessage {
  type: string; // MsgType: text, image, voice, event…
  sourceId?: string; // FromUserName (openid)
  targetId?: string; // ToUserName (service account)
  content?: string; // Content, text messages only
  id?: string; // MsgId
  createTime?: number; // unix seconds
  event?: string; // Event, for type === 'event'
}

export interface WebhookEnvelope {
  signature: string;
  timestamp: string;
  nonce: string;
  rawBody: Buffer;
  msgSignature?: string;
}

export interface WeChatSendAck {
  msgId: string | null;
}

export interface CxonePostAck {
  id: string;
  status: string;
  thread?: { idOnExternalPlatform?: string };
}

/** Outbound side towards the WeChat user. */
export interface WeChatSender {
  sendText(
    externalId: string,
    text: string,
    signal?: AbortSignal,
  ): Promise<WeChatSendAck>;
}

/** Outbound side towards the CXone thread. */
export interface CxonePoster {
  postInbound(
    externalId: string,
    text: string,
    signal?: AbortSignal,
  ): Promise<CxonePostAck>;
}

export const WECHAT_SENDER = 'WECHAT_SENDER';
export const CXONE_POSTER = 'CXONE_POSTER';

export type WebhookState =
  | 'RECEIVED'
  | 'VERIFIED'
  | 'NORMALIZED'
  | 'FORWARDED'
  | 'DROPPED'
  | 'ACKNOWLEDGED';

export type DropReason =
  | 'DECRYPT_FAILED'
  | 'PARSE_FAILED'
  | 'UNSUPPORTED_TYPE'
  | 'MISSING_FIELDS';

/**
 * How an acknowledged webhook ended. `FAILED` means the forward was
 * attempted and the downstream call failed; the sender still gets a 200.
 */
export type WebhookOutcome =
  | { result: 'FORWARDED'; externalId: string; trail: WebhookState[] }
  | { result: 'DROPPED'; reason: DropReason; trail: WebhookState[] }
  | {
      result: 'FAILED';
      externalId?: string;
      errorKind: string;
      trail: WebhookState[];
    };
