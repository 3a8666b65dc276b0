import type { Message } from '../messages/message.js';
import { createPatternResolver, defaultPattern, exactPattern, type Pattern } from '../views/patterns.js';

export const START_REPLY = 'Hi! Send me any text and I will repeat it. Try `ping`.';

const echo = (message: Message) => message.text;

export const DEFAULT_PATTERNS: readonly Pattern[] = [
  exactPattern('/start', () => START_REPLY),
  exactPattern('ping', () => 'pong'),
  defaultPattern(echo),
];

export const resolveDefaultView = createPatternResolver(DEFAULT_PATTERNS);
