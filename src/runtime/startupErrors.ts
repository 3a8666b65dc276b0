import path from 'node:path';

type StartupErrorContext = {
  mode: string;
  botHome: string;
  logDir: string;
};

type StartupReportSink = Pick<Console, 'error'>;

const normalizeMessage = (err: unknown): string => {
  if (err instanceof Error) return err.message;
  return String(err);
};

const uniqueSteps = (steps: string[]): string[] => {
  return Array.from(new Set(steps));
};

export const buildNextSteps = (message: string): string[] => {
  const steps: string[] = [];
  const lower = message.toLowerCase();

  if (lower.includes('telegram_bot_token')) {
    steps.push('Set TELEGRAM_BOT_TOKEN in your environment or .env file.');
  }
  if (lower.includes('hostname')) {
    steps.push('Set BOT_HOSTNAME to the public HTTPS URL Telegram should call, or use BOT_MODE=polling.');
  }
  if (lower.includes('mode')) {
    steps.push('Set BOT_MODE to either "polling" or "webhook".');
  }
  if (lower.includes('gateway_port') || lower.includes('eaddrinuse')) {
    steps.push('Update GATEWAY_PORT to a free positive port.');
  }
  if (lower.includes('unauthorized')) {
    steps.push('Check TELEGRAM_BOT_TOKEN with @BotFather; Telegram rejected it.');
  }

  steps.push('Copy .env.example to .env and review every value.');
  return uniqueSteps(steps);
};

export function reportStartupError(
  err: unknown,
  context: StartupErrorContext,
  sink: StartupReportSink = console,
): void {
  const message = normalizeMessage(err);

  sink.error(`botline (${context.mode}) failed to start.`);
  sink.error(`Reason: ${message}`);
  sink.error('Relevant paths:');
  sink.error(`- BOTLINE_HOME: ${context.botHome}`);
  sink.error(`- Logs (runtime): ${path.join(context.logDir, 'runtime.jsonl')}`);
  sink.error(`- Logs (events): ${path.join(context.logDir, 'events.jsonl')}`);
  sink.error('Next steps:');
  for (const step of buildNextSteps(message)) {
    sink.error(`- ${step}`);
  }
}
