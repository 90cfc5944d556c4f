import { COLLECTIONS } from '../constants/collections';
import { DocumentStore, StoredDocument, arrayRemove, arrayUnion } from '../data/document-store';
import { MessagingErrorType, createMessagingError } from '../errors/messaging-errors';
import { isBlockedBy, otherParticipantId } from '../models/conversation.model';
import { MessageReport, ReportInput, ReportStatus, isReportReason } from '../models/report.model';
import { Clock, systemClock } from '../utils/clock';
import { readOptionalString, readString, toMillis } from '../utils/document-fields';
import { ConversationsService } from './conversations';

const REPORT_STATUSES: readonly ReportStatus[] = ['pending', 'reviewed', 'resolved'];

export function mapReport({ id, data }: StoredDocument): MessageReport {
  const reason = data['reason'];
  const status = REPORT_STATUSES.find(candidate => candidate === data['status']);
  return {
    id,
    reporterId: readString(data, 'reporterId'),
    reportedUserId: readString(data, 'reportedUserId'),
    conversationId: readString(data, 'conversationId'),
    messageId: readOptionalString(data, 'messageId') ?? null,
    reason: isReportReason(reason) ? reason : 'other',
    additionalDetails: readOptionalString(data, 'additionalDetails') ?? null,
    timestamp: toMillis(data['timestamp']) ?? 0,
    status: status ?? 'pending',
  };
}

export class ModerationService {
  constructor(
    private store: DocumentStore,
    private conversations: ConversationsService,
    private clock: Clock = systemClock,
  ) {}

  /** Hides the conversation from the blocker's list. Nothing is deleted. */
  async block(conversationId: string, blockerId: string): Promise<void> {
    await this.conversations.requireParticipant(conversationId, blockerId);
    await this.store.update(COLLECTIONS.conversations, conversationId, {
      blockedUsers: arrayUnion(blockerId),
    });
  }

  async unblock(conversationId: string, blockerId: string): Promise<void> {
    await this.conversations.requireParticipant(conversationId, blockerId);
    await this.store.update(COLLECTIONS.conversations, conversationId, {
      blockedUsers: arrayRemove(blockerId),
    });
  }

  async isBlocked(conversationId: string, userId: string): Promise<boolean> {
    return isBlockedBy(await this.conversations.get(conversationId), userId);
  }

  /** Files an append-only report; the conversation and messages stay untouched. */
  async report(reporterId: string, input: ReportInput): Promise<string> {
    if (!reporterId) {
      throw createMessagingError(MessagingErrorType.UNAUTHENTICATED);
    }
    if (!isReportReason(input.reason)) {
      throw createMessagingError(MessagingErrorType.INVALID_REPORT, undefined, `Unknown report reason: ${input.reason}`);
    }

    const conversation = await this.conversations.requireParticipant(input.conversationId, reporterId);
    if (!input.reportedUserId || otherParticipantId(conversation, reporterId) !== input.reportedUserId) {
      throw createMessagingError(
        MessagingErrorType.INVALID_REPORT,
        undefined,
        'Only the other participant of the conversation can be reported',
      );
    }

    if (input.messageId) {
      const message = await this.store.get(COLLECTIONS.messages, input.messageId);
      if (!message || readString(message.data, 'conversationId') !== input.conversationId) {
        throw createMessagingError(
          MessagingErrorType.NOT_FOUND,
          undefined,
          `Message ${input.messageId} is not part of conversation ${input.conversationId}`,
        );
      }
    }

    return this.store.create(COLLECTIONS.reports, {
      reporterId,
      reportedUserId: input.reportedUserId,
      conversationId: input.conversationId,
      messageId: input.messageId ?? null,
      reason: input.reason,
      additionalDetails: input.details?.trim() || null,
      timestamp: this.clock(),
      status: 'pending',
    });
  }

  async reportsFiledBy(reporterId: string): Promise<MessageReport[]> {
    const docs = await this.store.query({
      collection: COLLECTIONS.reports,
      where: [{ field: 'reporterId', op: '==', value: reporterId }],
      orderBy: [{ field: 'timestamp', direction: 'desc' }],
    });
    return docs.map(mapReport);
  }
}
