/**
 * Satori Telegram — Satori Protocol Types
 *
 * Resource and event shapes exchanged with Satori applications.
 * Field names follow the Satori wire format.
 */

// ============================================================================
// RESOURCES
// ============================================================================

export const ChannelType = {
  TEXT: 0,
  DIRECT: 1,
  CATEGORY: 2,
  VOICE: 3,
} as const;

export type ChannelTypeValue = (typeof ChannelType)[keyof typeof ChannelType];

export const LoginStatus = {
  OFFLINE: 0,
  ONLINE: 1,
  CONNECT: 2,
  DISCONNECT: 3,
  RECONNECT: 4,
} as const;

export type LoginStatusValue = (typeof LoginStatus)[keyof typeof LoginStatus];

export interface SatoriUser {
  id: string;
  name?: string;
  nick?: string;
  avatar?: string;
  is_bot?: boolean;
}

export interface SatoriChannel {
  id: string;
  type: ChannelTypeValue;
  name?: string;
}

export interface SatoriGuild {
  id: string;
  name?: string;
  avatar?: string;
}

export interface SatoriLogin {
  user?: SatoriUser;
  self_id?: string;
  platform: string;
  adapter: string;
  status: LoginStatusValue;
}

export interface MessageObject {
  id: string;
  /** Satori markup. */
  content: string;
  channel?: SatoriChannel;
  guild?: SatoriGuild;
  user?: SatoriUser;
  created_at?: number;
}

// ============================================================================
// EVENTS
// ============================================================================

export type SatoriEventType = 'message-created' | 'interaction/button';

export interface SatoriEvent {
  id: number;
  type: SatoriEventType;
  platform: string;
  self_id: string;
  /** Milliseconds since epoch. */
  timestamp: number;
  channel?: SatoriChannel;
  guild?: SatoriGuild;
  user?: SatoriUser;
  message?: MessageObject;
  button?: { id: string };
}
