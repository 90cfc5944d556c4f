import { DEFAULT_MESSAGING_CONFIG, MessagingConfig } from '../../../environments/environment';
import { DocumentStore } from '../data/document-store';
import { MessagingErrorType, createMessagingError } from '../errors/messaging-errors';
import {
  Conversation,
  ConversationCursor,
  ConversationPage,
  Message,
  MessageContext,
  MessageCursor,
  MessagePage,
} from '../models/conversation.model';
import { MessageReport, ReportInput } from '../models/report.model';
import { ConversationsService } from '../services/conversations';
import { MessagingService } from '../services/messaging';
import { ModerationService } from '../services/moderation';
import { Clock, systemClock } from '../utils/clock';
import { SessionUser } from './auth.store';
import { ListenerHandle, ListenerRegistry, SnapshotResult, TeardownReport } from './listener-registry';

export interface MessagingServices {
  config: MessagingConfig;
  conversations: ConversationsService;
  messaging: MessagingService;
  moderation: ModerationService;
}

export function createMessagingServices(
  store: DocumentStore,
  config: MessagingConfig = DEFAULT_MESSAGING_CONFIG,
  clock: Clock = systemClock,
): MessagingServices {
  const conversations = new ConversationsService(store, config, clock);
  return {
    config,
    conversations,
    messaging: new MessagingService(store, conversations, config, clock),
    moderation: new ModerationService(store, conversations, clock),
  };
}

/**
 * Everything the app layer calls while one user is signed in. Each session
 * owns its listener registry; `teardownAllSubscriptions` ends the session.
 */
export class MessagingSession {
  private readonly listeners = new ListenerRegistry();
  private teardownReport: TeardownReport | null = null;

  constructor(
    readonly user: SessionUser,
    private services: MessagingServices,
  ) {}

  isActive() {
    return this.teardownReport === null;
  }

  findOrCreateConversation(userA: string, userB: string): Promise<string> {
    return this.run(userA, () => this.services.conversations.findOrCreate(userA, userB));
  }

  sendMessage(senderId: string, recipientId: string, text: string, context?: MessageContext): Promise<Message> {
    return this.run(senderId, () =>
      this.services.messaging.send(
        {
          id: senderId,
          name: this.user.displayName || this.services.config.unknownParticipantName,
          profileImage: this.user.photoURL,
        },
        recipientId,
        text,
        context,
      ),
    );
  }

  fetchMessages(conversationId: string, limit?: number, cursor?: MessageCursor | null): Promise<MessagePage> {
    return this.run(this.user.uid, () =>
      this.services.messaging.fetchMessages(conversationId, this.user.uid, limit, cursor),
    );
  }

  loadConversations(userId: string): Promise<Conversation[]> {
    return this.run(userId, () => this.services.conversations.loadConversations(userId));
  }

  fetchConversations(userId: string, limit?: number, cursor?: ConversationCursor | null): Promise<ConversationPage> {
    return this.run(userId, () => this.services.conversations.fetchConversations(userId, limit, cursor));
  }

  subscribeToMessages(conversationId: string, onUpdate: (result: SnapshotResult<Message>) => void): ListenerHandle {
    this.assertActive();
    return this.listeners.subscribe(
      'messages',
      conversationId,
      this.services.messaging.listenMessages(conversationId, this.user.uid),
      onUpdate,
    );
  }

  unsubscribeFromMessages(conversationId: string) {
    this.listeners.unsubscribe('messages', conversationId);
  }

  subscribeToConversations(
    userId: string,
    onUpdate: (result: SnapshotResult<Conversation>) => void,
  ): ListenerHandle {
    this.assertActing(userId);
    return this.listeners.subscribe(
      'conversations',
      userId,
      this.services.conversations.listenConversations(userId),
      onUpdate,
    );
  }

  unsubscribeFromConversations(userId: string) {
    this.listeners.unsubscribe('conversations', userId);
  }

  markRead(conversationId: string, readerId: string): Promise<number> {
    return this.run(readerId, () => this.services.messaging.markRead(conversationId, readerId));
  }

  editMessage(messageId: string, newText: string): Promise<Message> {
    return this.run(this.user.uid, () => this.services.messaging.edit(messageId, this.user.uid, newText));
  }

  deleteMessage(messageId: string): Promise<void> {
    return this.run(this.user.uid, () => this.services.messaging.softDelete(messageId, this.user.uid));
  }

  restoreMessage(messageId: string): Promise<void> {
    return this.run(this.user.uid, () => this.services.messaging.restore(messageId, this.user.uid));
  }

  async deleteConversation(conversationId: string): Promise<void> {
    await this.run(this.user.uid, () =>
      this.services.messaging.deleteConversation(conversationId, this.user.uid),
    );
    // The delete is already committed.
    try {
      this.listeners.unsubscribe('messages', conversationId);
    } catch (error) {
      console.error(`Listener for deleted conversation ${conversationId} failed to shut down`, error);
    }
  }

  async clearConversation(conversationId: string): Promise<void> {
    await this.run(this.user.uid, () =>
      this.services.messaging.clearConversation(conversationId, this.user.uid),
    );
  }

  block(conversationId: string, userId: string): Promise<void> {
    return this.run(userId, () => this.services.moderation.block(conversationId, userId));
  }

  unblock(conversationId: string, userId: string): Promise<void> {
    return this.run(userId, () => this.services.moderation.unblock(conversationId, userId));
  }

  report(input: ReportInput): Promise<string> {
    return this.run(this.user.uid, () => this.services.moderation.report(this.user.uid, input));
  }

  myReports(): Promise<MessageReport[]> {
    return this.run(this.user.uid, () => this.services.moderation.reportsFiledBy(this.user.uid));
  }

  unreadTotal(userId: string): Promise<number> {
    return this.run(userId, () => this.services.conversations.unreadTotal(userId));
  }

  activeListenerCount(): number {
    return this.listeners.activeCount();
  }

  /** Safe to call more than once; later calls return the first report. */
  teardownAllSubscriptions(): TeardownReport {
    if (!this.teardownReport) {
      this.teardownReport = this.listeners.close();
    }
    return this.teardownReport;
  }

  private assertActive() {
    if (!this.isActive()) {
      throw createMessagingError(MessagingErrorType.UNAUTHENTICATED, undefined, 'This session has been signed out');
    }
  }

  private assertActing(userId: string) {
    this.assertActive();
    if (!userId) {
      throw createMessagingError(MessagingErrorType.UNAUTHENTICATED);
    }
    if (userId !== this.user.uid) {
      throw createMessagingError(
        MessagingErrorType.UNAUTHORIZED,
        undefined,
        `Signed in as ${this.user.uid}, cannot act as ${userId}`,
      );
    }
  }

  private async run<T>(actingUserId: string, operation: () => Promise<T>): Promise<T> {
    this.assertActing(actingUserId);
    return operation();
  }
}
