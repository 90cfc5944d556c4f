import { Observable } from 'rxjs';
import { DEFAULT_MESSAGING_CONFIG, MessagingConfig } from '../../../environments/environment';
import { COLLECTIONS } from '../constants/collections';
import { DOCUMENT_ID, DocumentData, DocumentQuery, DocumentStore, StoredDocument } from '../data/document-store';
import { MessagingErrorType, createMessagingError } from '../errors/messaging-errors';
import {
  Conversation,
  ConversationCursor,
  ConversationPage,
  isBlockedBy,
  unreadCountFor,
} from '../models/conversation.model';
import { Clock, systemClock } from '../utils/clock';
import { conversationKeyFor, sortedPair } from '../utils/conversation-key';
import {
  readMillisMap,
  readNumberMap,
  readOptionalString,
  readString,
  readStringArray,
  readStringMap,
  toMillis,
} from '../utils/document-fields';

interface ParticipantDisplay {
  names: Record<string, string>;
  images: Record<string, string>;
}

export function mapConversation({ id, data }: StoredDocument): Conversation {
  const [first = '', second = ''] = readStringArray(data, 'participantIds');
  return {
    id,
    participantIds: [first, second],
    participantNames: readStringMap(data, 'participantNames'),
    participantImages: readStringMap(data, 'participantImages'),
    lastMessage: readString(data, 'lastMessage'),
    lastMessageTimestamp: toMillis(data['lastMessageTimestamp']) ?? 0,
    lastMessageSenderId: readString(data, 'lastMessageSenderId'),
    unreadCounts: readNumberMap(data, 'unreadCounts'),
    lastReadTimestamps: readMillisMap(data, 'lastReadTimestamps'),
    blockedUsers: readStringArray(data, 'blockedUsers'),
    createdAt: toMillis(data['createdAt']) ?? 0,
    updatedAt: toMillis(data['updatedAt']) ?? 0,
  };
}

export class ConversationsService {
  constructor(
    private store: DocumentStore,
    private config: MessagingConfig = DEFAULT_MESSAGING_CONFIG,
    private clock: Clock = systemClock,
  ) {}

  /**
   * Resolves the single conversation between two users. New conversations get
   * an id derived from the participant pair and are written with a
   * create-if-absent, so two first contacts racing each other land on the
   * same document. The participant scan only finds conversations stored under
   * a store-assigned id by older clients.
   */
  async findOrCreate(userA: string, userB: string): Promise<string> {
    if (!userA) {
      throw createMessagingError(MessagingErrorType.UNAUTHENTICATED);
    }
    if (!userB || userA === userB) {
      throw createMessagingError(MessagingErrorType.INVALID_RECIPIENT);
    }

    const key = conversationKeyFor(userA, userB);
    if (await this.store.get(COLLECTIONS.conversations, key)) {
      return key;
    }

    const legacy =
      (await this.findLegacyConversation(userA, userB)) ?? (await this.findLegacyConversation(userB, userA));
    if (legacy) {
      return legacy;
    }

    const data = await this.newConversationData(userA, userB);
    await this.store.createIfAbsent(COLLECTIONS.conversations, key, data);
    return key;
  }

  async get(conversationId: string): Promise<Conversation> {
    const snap = conversationId ? await this.store.get(COLLECTIONS.conversations, conversationId) : null;
    if (!snap) {
      throw createMessagingError(MessagingErrorType.NOT_FOUND, undefined, `Conversation ${conversationId} not found`);
    }
    return mapConversation(snap);
  }

  async requireParticipant(conversationId: string, userId: string): Promise<Conversation> {
    if (!userId) {
      throw createMessagingError(MessagingErrorType.UNAUTHENTICATED);
    }
    const conversation = await this.get(conversationId);
    if (!conversation.participantIds.includes(userId)) {
      throw createMessagingError(
        MessagingErrorType.UNAUTHORIZED,
        undefined,
        `User ${userId} is not part of conversation ${conversationId}`,
      );
    }
    return conversation;
  }

  /**
   * One page of the inbox, most recent first. Conversations the user blocked
   * do not count towards `limit`: the scan continues past them until the page
   * is full or the history runs out.
   */
  async fetchConversations(
    forUser: string,
    limit = this.config.conversationListLimit,
    cursor?: ConversationCursor | null,
  ): Promise<ConversationPage> {
    const pageSize = limit > 0 ? limit : this.config.conversationListLimit;
    const visible: Conversation[] = [];
    let after = cursor ?? null;
    let exhausted = false;

    while (!exhausted && visible.length < pageSize) {
      const wanted = Number.isFinite(pageSize) ? pageSize - visible.length : undefined;
      const docs = await this.store.query({
        ...this.inboxQuery(forUser),
        limit: wanted,
        startAfter: after ? [after.lastMessageTimestamp, after.id] : undefined,
      });
      exhausted = wanted === undefined || docs.length < wanted;

      for (const conversation of docs.map(mapConversation)) {
        after = { lastMessageTimestamp: conversation.lastMessageTimestamp, id: conversation.id };
        if (!isBlockedBy(conversation, forUser)) visible.push(conversation);
      }
    }

    return { conversations: visible, nextCursor: exhausted ? null : after };
  }

  /** Every conversation of the user except the ones they blocked, most recent first. */
  async loadConversations(forUser: string): Promise<Conversation[]> {
    const all: Conversation[] = [];
    let cursor: ConversationCursor | null = null;
    do {
      const page: ConversationPage = await this.fetchConversations(forUser, this.config.conversationListLimit, cursor);
      all.push(...page.conversations);
      cursor = page.nextCursor;
    } while (cursor);
    return all;
  }

  listenConversations(forUser: string): Observable<Conversation[]> {
    return new Observable(subscriber => {
      const unsubscribe = this.store.subscribe(
        this.inboxQuery(forUser),
        docs => subscriber.next(this.visibleTo(forUser, docs)),
        error => subscriber.error(error),
      );

      return () => unsubscribe();
    });
  }

  async unreadTotal(userId: string): Promise<number> {
    const docs = await this.store.query({
      collection: COLLECTIONS.conversations,
      where: [{ field: 'participantIds', op: 'array-contains', value: userId }],
    });
    return docs.map(mapConversation).reduce((sum, conversation) => sum + unreadCountFor(conversation, userId), 0);
  }

  async refreshParticipantInfo(conversationId: string): Promise<Conversation> {
    const conversation = await this.get(conversationId);
    const display = await this.loadParticipantDisplay(conversation.participantIds);
    await this.store.update(COLLECTIONS.conversations, conversationId, {
      participantNames: display.names,
      participantImages: display.images,
    });
    return { ...conversation, participantNames: display.names, participantImages: display.images };
  }

  // Unbounded: the live inbox holds every conversation, blocked ones filtered locally.
  private inboxQuery(forUser: string): DocumentQuery {
    return {
      collection: COLLECTIONS.conversations,
      where: [{ field: 'participantIds', op: 'array-contains', value: forUser }],
      orderBy: [
        { field: 'lastMessageTimestamp', direction: 'desc' },
        { field: DOCUMENT_ID, direction: 'desc' },
      ],
    };
  }

  private visibleTo(forUser: string, docs: StoredDocument[]): Conversation[] {
    return docs.map(mapConversation).filter(conversation => !isBlockedBy(conversation, forUser));
  }

  private async findLegacyConversation(owner: string, other: string): Promise<string | null> {
    const docs = await this.store.query({
      collection: COLLECTIONS.conversations,
      where: [{ field: 'participantIds', op: 'array-contains', value: owner }],
    });
    const match = docs.find(docSnap => {
      const participants = readStringArray(docSnap.data, 'participantIds');
      return participants.length === 2 && participants.includes(owner) && participants.includes(other);
    });
    return match?.id ?? null;
  }

  private async newConversationData(userA: string, userB: string): Promise<DocumentData> {
    const participantIds = sortedPair(userA, userB);
    const display = await this.loadParticipantDisplay(participantIds);
    const now = this.clock();

    return {
      participantIds,
      participantNames: display.names,
      participantImages: display.images,
      lastMessage: '',
      lastMessageTimestamp: now,
      lastMessageSenderId: '',
      unreadCounts: { [userA]: 0, [userB]: 0 },
      lastReadTimestamps: {},
      blockedUsers: [],
      createdAt: now,
      updatedAt: now,
    };
  }

  private async loadParticipantDisplay(participantIds: string[]): Promise<ParticipantDisplay> {
    const profiles = await Promise.all(participantIds.map(uid => this.store.get(COLLECTIONS.users, uid)));
    const names: Record<string, string> = {};
    const images: Record<string, string> = {};

    participantIds.forEach((uid, index) => {
      const profile = profiles[index]?.data ?? {};
      names[uid] =
        readOptionalString(profile, 'name') ??
        readOptionalString(profile, 'displayName') ??
        this.config.unknownParticipantName;
      const image = readOptionalString(profile, 'profileImageURL') ?? readOptionalString(profile, 'photoURL');
      if (image) images[uid] = image;
    });

    return { names, images };
  }
}
