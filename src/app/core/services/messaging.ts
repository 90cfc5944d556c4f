import { Observable, defer, switchMap } from 'rxjs';
import { DEFAULT_MESSAGING_CONFIG, MessagingConfig } from '../../../environments/environment';
import { COLLECTIONS } from '../constants/collections';
import {
  DOCUMENT_ID,
  DocumentData,
  DocumentQuery,
  DocumentStore,
  StoredDocument,
  deleteField,
  increment,
} from '../data/document-store';
import { MessagingErrorType, createMessagingError } from '../errors/messaging-errors';
import {
  MESSAGE_CONTEXT_TYPES,
  Message,
  MessageContext,
  MessageContextType,
  MessageCursor,
  MessagePage,
  MessageSender,
} from '../models/conversation.model';
import { Clock, systemClock } from '../utils/clock';
import { readBoolean, readOptionalString, readString, toMillis } from '../utils/document-fields';
import { ConversationsService } from './conversations';

function isContextType(value: string | undefined): value is MessageContextType {
  return MESSAGE_CONTEXT_TYPES.some(type => type === value);
}

function readContext(data: DocumentData): MessageContext | undefined {
  const type = readOptionalString(data, 'contextType');
  const id = readOptionalString(data, 'contextId');
  if (!isContextType(type) || !id) return undefined;
  return {
    type,
    id,
    title: readOptionalString(data, 'contextTitle'),
    image: readOptionalString(data, 'contextImage'),
    userId: readOptionalString(data, 'contextUserId'),
  };
}

// Stored flat with empty strings for "no context".
function contextFields(context?: MessageContext): DocumentData {
  return {
    contextType: context?.type ?? '',
    contextId: context?.id ?? '',
    contextTitle: context?.title ?? '',
    contextImage: context?.image ?? '',
    contextUserId: context?.userId ?? '',
  };
}

export function mapMessage({ id, data }: StoredDocument): Message {
  return {
    id,
    conversationId: readString(data, 'conversationId'),
    senderId: readString(data, 'senderId'),
    senderName: readString(data, 'senderName'),
    senderProfileImage: readString(data, 'senderProfileImage'),
    text: readString(data, 'text'),
    timestamp: toMillis(data['timestamp']) ?? 0,
    isDelivered: readBoolean(data, 'isDelivered'),
    deliveredAt: toMillis(data['deliveredAt']),
    isRead: readBoolean(data, 'isRead'),
    readAt: toMillis(data['readAt']),
    isEdited: readBoolean(data, 'isEdited'),
    editedAt: toMillis(data['editedAt']),
    isDeleted: readBoolean(data, 'isDeleted'),
    deletedAt: toMillis(data['deletedAt']),
    context: readContext(data),
  };
}

export class MessagingService {
  constructor(
    private store: DocumentStore,
    private conversations: ConversationsService,
    private config: MessagingConfig = DEFAULT_MESSAGING_CONFIG,
    private clock: Clock = systemClock,
  ) {}

  /**
   * Persists the message and the conversation summary in one batch. The
   * message is written as delivered: the backend has no delivery receipt
   * from the recipient device.
   */
  async send(sender: MessageSender, recipientId: string, text: string, context?: MessageContext): Promise<Message> {
    if (!sender.id) {
      throw createMessagingError(MessagingErrorType.UNAUTHENTICATED);
    }
    const body = text.trim();
    if (!body) {
      throw createMessagingError(MessagingErrorType.EMPTY_MESSAGE);
    }
    if (!recipientId || recipientId === sender.id) {
      throw createMessagingError(MessagingErrorType.INVALID_RECIPIENT);
    }

    const conversationId = await this.conversations.findOrCreate(sender.id, recipientId);
    const now = this.clock();
    const data: DocumentData = {
      conversationId,
      senderId: sender.id,
      senderName: sender.name,
      senderProfileImage: sender.profileImage ?? '',
      text: body,
      timestamp: now,
      isDelivered: true,
      deliveredAt: now,
      isRead: false,
      isEdited: false,
      isDeleted: false,
      ...contextFields(context),
    };

    const batch = this.store.batch();
    const messageId = batch.create(COLLECTIONS.messages, data);
    batch.update(COLLECTIONS.conversations, conversationId, {
      lastMessage: body,
      lastMessageTimestamp: now,
      lastMessageSenderId: sender.id,
      updatedAt: now,
      [`unreadCounts.${recipientId}`]: increment(1),
    });
    await batch.commit();

    return mapMessage({ id: messageId, data });
  }

  /**
   * Pages backwards from the newest message (or from `cursor`) and returns
   * the page oldest first. Pass `Infinity` to read the whole history.
   */
  async fetchMessages(
    conversationId: string,
    viewerId: string,
    limit = this.config.pageSize,
    cursor?: MessageCursor | null,
  ): Promise<MessagePage> {
    await this.conversations.requireParticipant(conversationId, viewerId);
    const pageSize = limit > 0 ? limit : this.config.pageSize;

    const docs = await this.store.query({
      ...this.visibleMessagesQuery(conversationId, 'desc'),
      limit: Number.isFinite(pageSize) ? pageSize : undefined,
      startAfter: cursor ? [cursor.timestamp, cursor.id] : undefined,
    });

    const newestFirst = docs.map(mapMessage);
    const oldest = newestFirst[newestFirst.length - 1];
    const nextCursor =
      oldest && Number.isFinite(pageSize) && newestFirst.length === pageSize
        ? { timestamp: oldest.timestamp, id: oldest.id }
        : null;

    return { messages: newestFirst.reverse(), nextCursor };
  }

  /** Errors with NOT_FOUND or UNAUTHORIZED before any snapshot unless `viewerId` takes part. */
  listenMessages(conversationId: string, viewerId: string): Observable<Message[]> {
    return defer(() => this.conversations.requireParticipant(conversationId, viewerId)).pipe(
      switchMap(
        () =>
          new Observable<Message[]>(subscriber => {
            const unsubscribe = this.store.subscribe(
              this.visibleMessagesQuery(conversationId, 'asc'),
              docs => subscriber.next(docs.map(mapMessage)),
              error => subscriber.error(error),
            );

            return () => unsubscribe();
          }),
      ),
    );
  }

  async getMessage(messageId: string): Promise<Message> {
    const snap = messageId ? await this.store.get(COLLECTIONS.messages, messageId) : null;
    if (!snap) {
      throw createMessagingError(MessagingErrorType.NOT_FOUND, undefined, `Message ${messageId} not found`);
    }
    return mapMessage(snap);
  }

  /**
   * Marks the other participant's unread messages as read and resets the
   * reader's counter in the same batch. Resolves with the number of messages
   * that changed.
   */
  async markRead(conversationId: string, readerId: string): Promise<number> {
    await this.conversations.requireParticipant(conversationId, readerId);

    const unread = await this.store.query({
      collection: COLLECTIONS.messages,
      where: [
        { field: 'conversationId', op: '==', value: conversationId },
        { field: 'isRead', op: '==', value: false },
        { field: 'senderId', op: '!=', value: readerId },
      ],
    });

    const now = this.clock();
    const batch = this.store.batch();
    for (const docSnap of unread) {
      batch.update(COLLECTIONS.messages, docSnap.id, { isRead: true, readAt: now });
    }
    batch.update(COLLECTIONS.conversations, conversationId, {
      [`unreadCounts.${readerId}`]: 0,
      [`lastReadTimestamps.${readerId}`]: now,
    });
    await batch.commit();

    return unread.length;
  }

  async edit(messageId: string, editorId: string, newText: string): Promise<Message> {
    const body = newText.trim();
    if (!body) {
      throw createMessagingError(MessagingErrorType.EMPTY_MESSAGE);
    }
    const message = await this.requireOwnMessage(messageId, editorId);
    if (message.isDeleted) {
      throw createMessagingError(MessagingErrorType.NOT_FOUND, undefined, `Message ${messageId} was deleted`);
    }

    const editedAt = this.clock();
    await this.store.update(COLLECTIONS.messages, messageId, { text: body, isEdited: true, editedAt });
    return { ...message, text: body, isEdited: true, editedAt };
  }

  /**
   * Hides the message from reads and listeners. Unread counters and the
   * conversation's last message summary are left as they are.
   */
  async softDelete(messageId: string, requesterId: string): Promise<void> {
    const message = await this.requireOwnMessage(messageId, requesterId);
    if (message.isDeleted) return;
    await this.store.update(COLLECTIONS.messages, messageId, { isDeleted: true, deletedAt: this.clock() });
  }

  async restore(messageId: string, requesterId: string): Promise<void> {
    const message = await this.requireOwnMessage(messageId, requesterId);
    if (!message.isDeleted) return;
    await this.store.update(COLLECTIONS.messages, messageId, { isDeleted: false, deletedAt: deleteField() });
  }

  /** Removes the conversation and every message in it in one batch. */
  async deleteConversation(conversationId: string, requesterId: string): Promise<number> {
    await this.conversations.requireParticipant(conversationId, requesterId);
    const messages = await this.allMessages(conversationId);

    const batch = this.store.batch();
    for (const docSnap of messages) {
      batch.delete(COLLECTIONS.messages, docSnap.id);
    }
    batch.delete(COLLECTIONS.conversations, conversationId);
    await batch.commit();

    return messages.length;
  }

  /** Deletes the history but keeps the conversation, with its summary and counters reset. */
  async clearConversation(conversationId: string, requesterId: string): Promise<number> {
    const conversation = await this.conversations.requireParticipant(conversationId, requesterId);
    const messages = await this.allMessages(conversationId);
    const now = this.clock();

    const batch = this.store.batch();
    for (const docSnap of messages) {
      batch.delete(COLLECTIONS.messages, docSnap.id);
    }
    const [first, second] = conversation.participantIds;
    batch.update(COLLECTIONS.conversations, conversationId, {
      lastMessage: '',
      lastMessageSenderId: '',
      lastMessageTimestamp: now,
      unreadCounts: { [first]: 0, [second]: 0 },
      updatedAt: now,
    });
    await batch.commit();

    return messages.length;
  }

  /** Counts stored messages, soft-deleted ones included. */
  async countMessages(conversationId: string): Promise<number> {
    return (await this.allMessages(conversationId)).length;
  }

  private visibleMessagesQuery(conversationId: string, direction: 'asc' | 'desc'): DocumentQuery {
    return {
      collection: COLLECTIONS.messages,
      where: [
        { field: 'conversationId', op: '==', value: conversationId },
        { field: 'isDeleted', op: '==', value: false },
      ],
      orderBy: [
        { field: 'timestamp', direction },
        { field: DOCUMENT_ID, direction },
      ],
    };
  }

  private allMessages(conversationId: string): Promise<StoredDocument[]> {
    return this.store.query({
      collection: COLLECTIONS.messages,
      where: [{ field: 'conversationId', op: '==', value: conversationId }],
    });
  }

  private async requireOwnMessage(messageId: string, userId: string): Promise<Message> {
    if (!userId) {
      throw createMessagingError(MessagingErrorType.UNAUTHENTICATED);
    }
    const message = await this.getMessage(messageId);
    if (message.senderId !== userId) {
      throw createMessagingError(
        MessagingErrorType.UNAUTHORIZED,
        undefined,
        `Only the sender can change message ${messageId}`,
      );
    }
    return message;
  }
}
