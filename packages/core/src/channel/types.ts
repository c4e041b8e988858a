// packages/core/src/channel/types.ts

export type IncomingMessage = {
  text: string;
  channelId: string;
  userId: string;
};

export type UserProfile = {
  email?: string;
  firstName?: string;
  lastName?: string;
};

export interface MessageChannel {
  /** Resolves false when the channel rejects our credentials. */
  connect(): Promise<boolean>;
  receive(): Promise<IncomingMessage | null>;
  send(channelId: string, text: string): Promise<void>;
  userProfile(userId: string): Promise<UserProfile | null>;
}
