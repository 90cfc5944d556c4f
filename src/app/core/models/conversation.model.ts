export type MessageContextType = 'post' | 'reel' | 'status';

export const MESSAGE_CONTEXT_TYPES: readonly MessageContextType[] = ['post', 'reel', 'status'];

/** Links a message to a post, reel or status elsewhere in the app. */
export interface MessageContext {
  type: MessageContextType;
  id: string;
  title?: string;
  image?: string;
  userId?: string;
}

export interface Conversation {
  id: string;
  participantIds: [string, string];
  participantNames: Record<string, string>;
  participantImages: Record<string, string>;
  lastMessage: string;
  lastMessageTimestamp: number;
  lastMessageSenderId: string;
  unreadCounts: Record<string, number>;
  lastReadTimestamps: Record<string, number>;
  blockedUsers: string[];
  createdAt: number;
  updatedAt: number;
}

export interface Message {
  id: string;
  conversationId: string;
  senderId: string;
  senderName: string;
  senderProfileImage: string;
  text: string;
  timestamp: number;
  isDelivered: boolean;
  deliveredAt?: number;
  isRead: boolean;
  readAt?: number;
  isEdited: boolean;
  editedAt?: number;
  isDeleted: boolean;
  deletedAt?: number;
  context?: MessageContext;
}

export interface MessageSender {
  id: string;
  name: string;
  profileImage?: string | null;
}

export interface MessageCursor {
  timestamp: number;
  id: string;
}

export interface MessagePage {
  messages: Message[];
  /** `null` once the oldest message has been returned. */
  nextCursor: MessageCursor | null;
}

export interface ConversationCursor {
  lastMessageTimestamp: number;
  id: string;
}

export interface ConversationPage {
  conversations: Conversation[];
  /** `null` once the oldest conversation has been returned. */
  nextCursor: ConversationCursor | null;
}

export function otherParticipantId(conversation: Conversation, currentUid: string): string | undefined {
  return conversation.participantIds.find(uid => uid !== currentUid);
}

export function otherParticipantName(conversation: Conversation, currentUid: string): string | undefined {
  const otherId = otherParticipantId(conversation, currentUid);
  return otherId ? conversation.participantNames[otherId] : undefined;
}

export function otherParticipantImage(conversation: Conversation, currentUid: string): string | undefined {
  const otherId = otherParticipantId(conversation, currentUid);
  return otherId ? conversation.participantImages[otherId] : undefined;
}

export function isBlockedBy(conversation: Conversation, uid: string): boolean {
  return conversation.blockedUsers.includes(uid);
}

export function unreadCountFor(conversation: Conversation, uid: string): number {
  return conversation.unreadCounts[uid] ?? 0;
}
