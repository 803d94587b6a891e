import path from 'path';
import { createFileStorage, type CollectionStorage } from '../utils/fileStorage.js';
import { Assistant } from '../src/assistant/assistant.js';
import { createGroqProvider, createOllamaProvider, type InferenceProvider } from '../src/assistant/providers.js';
import { SessionManager } from '../src/auth/sessions.js';
import { UserStore } from '../src/auth/users.js';
import { collectData } from '../src/dashboard/stats.js';
import { RecordStore } from '../src/store/recordStore.js';
import type { AppConfig } from './config.js';

export type AppServices = {
  config: AppConfig;
  store: RecordStore;
  users: UserStore;
  sessions: SessionManager;
  assistant: Assistant;
};

export type ServiceOverrides = {
  storage?: CollectionStorage;
  providers?: InferenceProvider[];
};

export function configuredProviders(config: AppConfig): InferenceProvider[] {
  const providers: InferenceProvider[] = [];
  if (config.groq.apiKey) providers.push(createGroqProvider(config.groq));
  if (config.ollama.url) providers.push(createOllamaProvider(config.ollama));
  return providers;
}

export function createServices(config: AppConfig, overrides: ServiceOverrides = {}): AppServices {
  const store = new RecordStore({
    storage: overrides.storage ?? createFileStorage(config.dataDir),
    importPolicy: { allowedRoles: config.importRoles },
  });
  const users = new UserStore({
    filePath: path.join(config.dataDir, 'users.json'),
    adminPassword: config.adminPassword,
    adminEmail: config.adminEmail,
  });
  const assistant = new Assistant({
    data: () => collectData(store),
    providers: overrides.providers ?? configuredProviders(config),
    timeoutMs: config.assistantTimeoutMs,
  });
  return { config, store, users, sessions: new SessionManager(), assistant };
}
