import dotenv from 'dotenv';

dotenv.config();

export interface FirebaseConfig {
  apiKey: string;
  authDomain: string;
  projectId: string;
  storageBucket: string;
  messagingSenderId: string;
  appId: string;
}

export interface MessagingConfig {
  pageSize: number;
  conversationListLimit: number;
  unknownParticipantName: string;
}

export interface Environment {
  production: boolean;
  firebase: FirebaseConfig;
  messaging: MessagingConfig;
}

export const DEFAULT_MESSAGING_CONFIG: MessagingConfig = {
  pageSize: 50,
  conversationListLimit: 50,
  unknownParticipantName: 'Unknown',
};

export function positiveInt(raw: string | undefined, fallback: number): number {
  if (!raw) return fallback;
  const value = Number(raw);
  return Number.isInteger(value) && value > 0 ? value : fallback;
}

export function loadEnvironment(env: NodeJS.ProcessEnv = process.env): Environment {
  return {
    production: env['NODE_ENV'] === 'production',
    firebase: {
      apiKey: env['FIREBASE_API_KEY'] ?? '',
      authDomain: env['FIREBASE_AUTH_DOMAIN'] ?? '',
      projectId: env['FIREBASE_PROJECT_ID'] ?? '',
      storageBucket: env['FIREBASE_STORAGE_BUCKET'] ?? '',
      messagingSenderId: env['FIREBASE_MESSAGING_SENDER_ID'] ?? '',
      appId: env['FIREBASE_APP_ID'] ?? '',
    },
    messaging: {
      pageSize: positiveInt(env['MESSAGING_PAGE_SIZE'], DEFAULT_MESSAGING_CONFIG.pageSize),
      conversationListLimit: positiveInt(
        env['MESSAGING_CONVERSATION_LIMIT'],
        DEFAULT_MESSAGING_CONFIG.conversationListLimit,
      ),
      unknownParticipantName:
        env['MESSAGING_UNKNOWN_NAME']?.trim() || DEFAULT_MESSAGING_CONFIG.unknownParticipantName,
    },
  };
}

export const environment: Environment = loadEnvironment();
