import type { Message } from '../messages/message.js';

export type ViewResult = string | null | undefined;

export type ViewHandler = (message: Message) => ViewResult | Promise<ViewResult>;

/** Maps a message to the view that answers it, or `null` when nothing does. */
export type ViewResolver = (message: Message) => ViewHandler | null;

export type Pattern = {
  readonly name: string;
  matches: (message: Message) => boolean;
  readonly view: ViewHandler;
};

export function exactPattern(text: string, view: ViewHandler): Pattern {
  return {
    name: `exact:${text}`,
    matches: (message) => message.text === text,
    view,
  };
}

/** Catch-all; belongs at the end of a pattern list. */
export function defaultPattern(view: ViewHandler): Pattern {
  return {
    name: 'default',
    matches: () => true,
    view,
  };
}

export function createPatternResolver(patterns: readonly Pattern[]): ViewResolver {
  return (message) => {
    const match = patterns.find((pattern) => pattern.matches(message));
    return match ? match.view : null;
  };
}

/** Runs a view and normalizes "nothing to say" to `null`. */
export async function getResponse(view: ViewHandler, message: Message): Promise<string | null> {
  const result = await view(message);
  if (typeof result !== 'string' || result.length === 0) {
    return null;
  }
  return result;
}
