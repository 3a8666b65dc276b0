import { appendFile, mkdir } from 'node:fs/promises';
import path from 'node:path';

export type EventLogType =
  | 'telegram.update'
  | 'telegram.reply'
  | 'telegram.delivery.failed'
  | 'telegram.dispatch.error';

export type EventLogRecord = {
  ts: string;
  type: EventLogType;
  data: Record<string, unknown>;
};

export async function appendJsonl(filePath: string, record: EventLogRecord) {
  await mkdir(path.dirname(filePath), { recursive: true });
  await appendFile(filePath, JSON.stringify(record) + '\n', 'utf8');
}

type EventLogOptions = {
  logDir: string;
  now?: () => Date;
  append?: typeof appendJsonl;
};

export type EventLog = {
  readonly path: string;
  write: (type: EventLogType, data: Record<string, unknown>) => Promise<void>;
};

/** Timestamped writer for `events.jsonl` under `logDir`. */
export function createEventLog(options: EventLogOptions): EventLog {
  const { now = () => new Date(), append = appendJsonl } = options;
  const logPath = path.join(options.logDir, 'events.jsonl');

  return {
    path: logPath,
    write: async (type, data) => {
      await append(logPath, { ts: now().toISOString(), type, data });
    },
  };
}
