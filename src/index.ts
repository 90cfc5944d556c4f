export { createMessagingApp, MessagingApp } from './app/app';
export { firebaseServices, FirebaseServices } from './app/app.config';
export * from './app/core/constants/collections';
export * from './app/core/data/document-store';
export { FirestoreDocumentStore } from './app/core/data/firestore-document-store';
export * from './app/core/errors/messaging-errors';
export * from './app/core/models/conversation.model';
export * from './app/core/models/report.model';
export { AuthService, toSessionUser } from './app/core/services/auth';
export { ConversationsService, mapConversation } from './app/core/services/conversations';
export { MessagingService, mapMessage } from './app/core/services/messaging';
export { ModerationService, mapReport } from './app/core/services/moderation';
export { AuthStateSource, AuthStore, SessionUser } from './app/core/store/auth.store';
export * from './app/core/store/listener-registry';
export { MessagingServices, MessagingSession, createMessagingServices } from './app/core/store/messaging-session';
export { MessagingSessionManager } from './app/core/store/session.manager';
export { Clock, systemClock } from './app/core/utils/clock';
export { conversationKeyFor } from './app/core/utils/conversation-key';
export { DEFAULT_MESSAGING_CONFIG, Environment, MessagingConfig, loadEnvironment } from './environments/environment';
