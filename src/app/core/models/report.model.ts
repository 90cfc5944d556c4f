export type ReportReason = 'spam' | 'harassment' | 'inappropriate' | 'fake' | 'other';

export type ReportStatus = 'pending' | 'reviewed' | 'resolved';

export const REPORT_REASON_LABELS: Record<ReportReason, string> = {
  spam: 'Spam',
  harassment: 'Harassment',
  inappropriate: 'Inappropriate Content',
  fake: 'Fake Profile',
  other: 'Other',
};

export function isReportReason(value: unknown): value is ReportReason {
  return typeof value === 'string' && Object.prototype.hasOwnProperty.call(REPORT_REASON_LABELS, value);
}

export interface MessageReport {
  id: string;
  reporterId: string;
  reportedUserId: string;
  conversationId: string;
  messageId: string | null;
  reason: ReportReason;
  additionalDetails: string | null;
  timestamp: number;
  status: ReportStatus;
}

export interface ReportInput {
  conversationId: string;
  reportedUserId: string;
  reason: ReportReason;
  messageId?: string;
  details?: string;
}
