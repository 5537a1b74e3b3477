// src/context.ts
import { CollegeScheduleSource } from "./college/source.ts";
import { getScheduleFont } from "./pdf/font.ts";
import { PdfScheduleRenderer, type FontLoader } from "./pdf/generator.ts";
import { ScheduleChecker } from "./schedule/checker.ts";
import { SupabaseArchiveStore, SupabaseSubscriberDirectory, createSupabase } from "./supabase/db.ts";
import { createTelegramApi, createTelegramMessenger, type TelegramApi } from "./telegram/api.ts";
import { Broadcaster } from "./telegram/broadcast.ts";
import type { SupabaseClient } from "@supabase/supabase-js";
import type { EnvConfig } from "./config.ts";
import type { Messenger, ScheduleArchiveStore, ScheduleRenderer, ScheduleSource, SubscriberDirectory } from "./types.ts";

/** Everything the process needs, built once at startup and passed down explicitly. */
export interface AppContext {
  config: EnvConfig;
  db: SupabaseClient;
  api: TelegramApi;
  messenger: Messenger;
  source: ScheduleSource;
  store: ScheduleArchiveStore;
  directory: SubscriberDirectory;
  loadFont: FontLoader;
  renderer: ScheduleRenderer;
  broadcaster: Broadcaster;
  checker: ScheduleChecker;
}

export function createAppContext(config: EnvConfig, fetchImpl: typeof fetch = fetch): AppContext {
  const db = createSupabase(config.supabaseUrl, config.supabaseKey, fetchImpl);
  const api = createTelegramApi(config.botToken, fetchImpl);
  const messenger = createTelegramMessenger(api);
  const source = new CollegeScheduleSource({ fetch: fetchImpl });
  const store = new SupabaseArchiveStore(db);
  const directory = new SupabaseSubscriberDirectory(db);
  const loadFont: FontLoader = () => getScheduleFont(config.fontUrl, fetchImpl);
  const renderer = new PdfScheduleRenderer(loadFont);
  const broadcaster = new Broadcaster(messenger);
  const checker = new ScheduleChecker(
    { source, store, directory, renderer, broadcaster, messenger, adminChatId: config.adminChatId },
    { notifyChanges: config.notifyChanges },
  );
  return { config, db, api, messenger, source, store, directory, loadFont, renderer, broadcaster, checker };
}
