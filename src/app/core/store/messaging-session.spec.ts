import { Observable } from 'rxjs';
import { COLLECTIONS } from '../constants/collections';
import { MessagingErrorType } from '../errors/messaging-errors';
import { Conversation, Message } from '../models/conversation.model';
import { conversationKeyFor } from '../utils/conversation-key';
import { ALICE, BOB, createHarness, settle } from '../../../testing/fixtures';
import { MemoryDocumentStore } from '../../../testing/memory-document-store';
import { SnapshotResult } from './listener-registry';
import { MessagingServices, MessagingSession } from './messaging-session';

const conversationId = conversationKeyFor('alice', 'bob');

describe('MessagingSession', () => {
  let store: MemoryDocumentStore;
  let services: MessagingServices;
  let alice: MessagingSession;
  let bob: MessagingSession;

  beforeEach(() => {
    ({ store, services } = createHarness());
    alice = new MessagingSession(ALICE, services);
    bob = new MessagingSession(BOB, services);
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should carry a conversation from first message to read', async () => {
    await expect(alice.findOrCreateConversation('alice', 'bob')).resolves.toBe(conversationId);

    await alice.sendMessage('alice', 'bob', 'Hi Bob');
    await alice.sendMessage('alice', 'bob', 'Are you there?');
    await expect(bob.unreadTotal('bob')).resolves.toBe(2);

    const page = await bob.fetchMessages(conversationId);
    expect(page.messages.map(message => message.text)).toEqual(['Hi Bob', 'Are you there?']);

    await expect(bob.markRead(conversationId, 'bob')).resolves.toBe(2);
    await expect(bob.unreadTotal('bob')).resolves.toBe(0);

    const inbox = await bob.loadConversations('bob');
    expect(inbox).toHaveLength(1);
    expect(inbox[0]).toMatchObject({ lastMessage: 'Are you there?', lastMessageSenderId: 'alice' });
    await expect(bob.fetchConversations('bob', 5)).resolves.toEqual({ conversations: inbox, nextCursor: null });
  });

  it("should sign messages with the session user's profile", async () => {
    const message = await alice.sendMessage('alice', 'bob', 'hello');
    expect(message).toMatchObject({ senderName: 'Alice', senderProfileImage: 'https://img.test/alice.png' });

    const anonymous = new MessagingSession({ uid: 'carol', displayName: null, photoURL: null }, services);
    const fromCarol = await anonymous.sendMessage('carol', 'bob', 'hello');
    expect(fromCarol).toMatchObject({ senderName: 'Unknown', senderProfileImage: '' });
  });

  it('should refuse to act for anyone but the session user', async () => {
    await expect(alice.sendMessage('bob', 'alice', 'spoofed')).rejects.toMatchObject({
      type: MessagingErrorType.UNAUTHORIZED,
    });
    await expect(alice.sendMessage('', 'bob', 'hi')).rejects.toMatchObject({
      type: MessagingErrorType.UNAUTHENTICATED,
    });
    await expect(alice.markRead(conversationId, 'bob')).rejects.toMatchObject({
      type: MessagingErrorType.UNAUTHORIZED,
    });
    expect(() => alice.subscribeToConversations('bob', jest.fn())).toThrow(
      expect.objectContaining({ type: MessagingErrorType.UNAUTHORIZED }),
    );
    expect(store.all(COLLECTIONS.messages)).toEqual([]);
  });

  it('should edit, delete and restore as the session user', async () => {
    const message = await alice.sendMessage('alice', 'bob', 'frist');

    await expect(alice.editMessage(message.id, 'first')).resolves.toMatchObject({ text: 'first', isEdited: true });
    await expect(bob.deleteMessage(message.id)).rejects.toMatchObject({ type: MessagingErrorType.UNAUTHORIZED });

    await alice.deleteMessage(message.id);
    await expect(bob.fetchMessages(conversationId)).resolves.toMatchObject({ messages: [] });

    await alice.restoreMessage(message.id);
    const page = await bob.fetchMessages(conversationId);
    expect(page.messages.map(entry => entry.text)).toEqual(['first']);
  });

  describe('listeners', () => {
    it('should stream messages and the inbox', async () => {
      const messageUpdates: SnapshotResult<Message>[] = [];
      const inboxUpdates: SnapshotResult<Conversation>[] = [];
      await alice.findOrCreateConversation('alice', 'bob');

      bob.subscribeToMessages(conversationId, result => messageUpdates.push(result));
      bob.subscribeToConversations('bob', result => inboxUpdates.push(result));
      await settle();
      await alice.sendMessage('alice', 'bob', 'ping');

      expect(bob.activeListenerCount()).toBe(2);
      expect(messageUpdates.map(result => result.items.map(message => message.text))).toEqual([[], ['ping']]);
      expect(inboxUpdates[inboxUpdates.length - 1].items.map(conversation => conversation.lastMessage)).toEqual([
        'ping',
      ]);
    });

    it('should keep a single listener per conversation', async () => {
      await alice.sendMessage('alice', 'bob', 'hi');

      bob.subscribeToMessages(conversationId, jest.fn());
      bob.subscribeToMessages(conversationId, jest.fn());
      await settle();

      expect(bob.activeListenerCount()).toBe(1);
      expect(store.activeSubscriptionCount()).toBe(1);

      bob.unsubscribeFromMessages(conversationId);
      expect(store.activeSubscriptionCount()).toBe(0);
    });

    it('should report listen failures to the subscriber', async () => {
      await alice.sendMessage('alice', 'bob', 'hi');
      store.failSubscriptions(COLLECTIONS.messages);
      const onUpdate = jest.fn();

      bob.subscribeToMessages(conversationId, onUpdate);
      await settle();

      expect(onUpdate).toHaveBeenCalledWith({
        items: [],
        error: expect.objectContaining({ type: MessagingErrorType.STORE_ERROR }),
      });
    });

    it('should not stream a conversation to someone outside it', async () => {
      await alice.sendMessage('alice', 'bob', 'secret');
      const mallory = new MessagingSession({ uid: 'mallory', displayName: 'Mallory', photoURL: null }, services);
      const onUpdate = jest.fn();

      mallory.subscribeToMessages(conversationId, onUpdate);
      await settle();

      expect(onUpdate).toHaveBeenCalledTimes(1);
      expect(onUpdate).toHaveBeenCalledWith({
        items: [],
        error: expect.objectContaining({ type: MessagingErrorType.UNAUTHORIZED }),
      });
      expect(store.activeSubscriptionCount()).toBe(0);
    });

    it('should drop the message listener of a deleted conversation', async () => {
      await alice.sendMessage('alice', 'bob', 'bye');
      bob.subscribeToMessages(conversationId, jest.fn());

      await bob.deleteConversation(conversationId);

      expect(bob.activeListenerCount()).toBe(0);
      expect(store.peek(COLLECTIONS.conversations, conversationId)).toBeNull();
    });

    it('should finish deleting when the message listener fails to shut down', async () => {
      await alice.sendMessage('alice', 'bob', 'bye');
      jest.spyOn(services.messaging, 'listenMessages').mockReturnValue(
        new Observable<Message[]>(() => () => {
          throw new Error('stuck');
        }),
      );
      bob.subscribeToMessages(conversationId, jest.fn());

      await expect(bob.deleteConversation(conversationId)).resolves.toBeUndefined();

      expect(bob.activeListenerCount()).toBe(0);
      expect(store.peek(COLLECTIONS.conversations, conversationId)).toBeNull();
      expect(console.error).toHaveBeenCalledWith(
        `Listener for deleted conversation ${conversationId} failed to shut down`,
        expect.objectContaining({ type: MessagingErrorType.STORE_ERROR }),
      );
    });
  });

  describe('teardownAllSubscriptions', () => {
    it('should cancel every listener once and close the session', async () => {
      bob.subscribeToMessages(conversationId, jest.fn());
      bob.subscribeToConversations('bob', jest.fn());

      const report = bob.teardownAllSubscriptions();

      expect(report).toEqual({ cancelled: 2, failures: [] });
      expect(store.activeSubscriptionCount()).toBe(0);
      expect(bob.isActive()).toBe(false);
      expect(bob.teardownAllSubscriptions()).toBe(report);
    });

    it('should reject work after teardown', async () => {
      alice.teardownAllSubscriptions();

      await expect(alice.sendMessage('alice', 'bob', 'too late')).rejects.toMatchObject({
        type: MessagingErrorType.UNAUTHENTICATED,
      });
      expect(() => alice.subscribeToMessages(conversationId, jest.fn())).toThrow(
        expect.objectContaining({ type: MessagingErrorType.UNAUTHENTICATED }),
      );
    });

    it("should leave other sessions' listeners running", () => {
      alice.subscribeToConversations('alice', jest.fn());
      bob.subscribeToConversations('bob', jest.fn());

      alice.teardownAllSubscriptions();

      expect(bob.activeListenerCount()).toBe(1);
      expect(store.activeSubscriptionCount()).toBe(1);
    });
  });

  describe('moderation', () => {
    it('should block, unblock and report as the session user', async () => {
      await alice.sendMessage('alice', 'bob', 'spam spam');

      await bob.block(conversationId, 'bob');
      await expect(bob.loadConversations('bob')).resolves.toEqual([]);
      await expect(alice.block(conversationId, 'bob')).rejects.toMatchObject({
        type: MessagingErrorType.UNAUTHORIZED,
      });
      await bob.unblock(conversationId, 'bob');
      await expect(bob.loadConversations('bob')).resolves.toHaveLength(1);

      const reportId = await bob.report({ conversationId, reportedUserId: 'alice', reason: 'spam' });
      const reports = await bob.myReports();
      expect(reports.map(report => report.id)).toEqual([reportId]);
      expect(reports[0]).toMatchObject({ reporterId: 'bob', reportedUserId: 'alice' });
    });

    it('should clear the history but keep the conversation', async () => {
      await alice.sendMessage('alice', 'bob', 'one');
      await bob.clearConversation(conversationId);

      await expect(bob.fetchMessages(conversationId)).resolves.toEqual({ messages: [], nextCursor: null });
      expect(store.peek(COLLECTIONS.conversations, conversationId)).toMatchObject({ lastMessage: '' });
    });
  });
});
