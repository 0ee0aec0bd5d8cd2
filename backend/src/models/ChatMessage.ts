export type MessageType = 'chat' | 'system' | 'admin';

export interface NewChatMessage {
  userId: number;
  text: string;
  toxic: boolean;
  score: number;
  type: MessageType;
}

export interface StoredMessage extends NewChatMessage {
  id: number;
  timestamp: string;
}

export interface StoredGiftEvent {
  id: number;
  fromUserId: number;
  giftId: number;
  amount: number;
  timestamp: string;
}

export type AdminActionKind = 'kick' | 'mute' | 'unmute' | 'set_threshold' | 'reset_metrics';

export interface NewAdminAction {
  adminUserId: number;
  action: AdminActionKind;
  targetUsername?: string | null;
  details?: string | null;
}

export interface AdminActionRecord {
  id: number;
  adminUsername: string;
  action: AdminActionKind;
  targetUsername: string | null;
  details: string | null;
  timestamp: string;
}

// Wire payloads

export interface ChatMessageOut {
  type: 'chat';
  id: number;
  user: string;
  message: string;
  toxic: boolean;
  score: number;
  ts: string;
  blocked: boolean;
}

export interface GiftEventOut {
  type: 'gift';
  from: string;
  gift_id: number;
  amount: number;
  ts: string;
}

export interface MutedNotice {
  type: 'muted';
  message: string;
  muted_until: string | null;
}

export interface SystemNotice {
  type: 'system';
  message: string;
  muted_until: string;
  timestamp: string;
}

export interface ErrorNotice {
  error: string;
  detail: string;
}

export interface ClosingNotice {
  code: number;
  reason: string;
}

export interface ServerToClientEvents {
  chat: (payload: ChatMessageOut) => void;
  gift: (payload: GiftEventOut) => void;
  muted: (payload: MutedNotice) => void;
  system: (payload: SystemNotice) => void;
  error: (payload: ErrorNotice) => void;
  closing: (payload: ClosingNotice) => void;
}

export interface ClientToServerEvents {
  message: (payload: unknown) => void;
}

export type OutboundEvent = keyof ServerToClientEvents;
export type OutboundPayload<E extends OutboundEvent> = Parameters<ServerToClientEvents[E]>[0];

/**
 * Close codes sent with `closing` notices and handshake rejections
 */
export enum CloseCode {
  KICKED = 4000,
  AUTH_REQUIRED = 4001,
  INVALID_AUTH = 4003,
  INVALID_USERNAME = 4004,
  REPLACED = 4009,
  INTERNAL_ERROR = 4011,
  CAPACITY_EXCEEDED = 4013,
  STALE = 4014,
}

export const CLOSE_REASONS: Record<CloseCode, string> = {
  [CloseCode.KICKED]: 'Kicked by admin',
  [CloseCode.AUTH_REQUIRED]: 'Authentication required',
  [CloseCode.INVALID_AUTH]: 'Invalid authentication',
  [CloseCode.INVALID_USERNAME]: 'Invalid username',
  [CloseCode.REPLACED]: 'Replaced by a newer connection',
  [CloseCode.INTERNAL_ERROR]: 'Internal error',
  [CloseCode.CAPACITY_EXCEEDED]: 'Server at capacity',
  [CloseCode.STALE]: 'Connection timed out',
};
