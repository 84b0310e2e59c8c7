import type { MusicCommand } from '../application/music-dispatcher.js';

export type ParsedMessage =
  | { type: 'command'; command: MusicCommand }
  | { type: 'usage'; message: string };

const ALIASES: Record<string, string> = {
  p: 'play',
  s: 'skip',
  next: 'skip',
  q: 'queue',
  np: 'nowplaying',
  vol: 'volume',
  rm: 'remove',
  dc: 'leave',
  disconnect: 'leave',
  helpme: 'help',
};

function parsePositiveInt(raw: string | undefined): number | undefined {
  if (raw === undefined || !/^\d+$/.test(raw)) return undefined;
  const value = Number.parseInt(raw, 10);
  return value > 0 ? value : undefined;
}

/**
 * Parses a prefixed chat message. Returns null for anything that is not one
 * of our commands, so other bots' commands pass through silently.
 */
export function parseCommand(content: string, prefix: string): ParsedMessage | null {
  if (!content.startsWith(prefix)) return null;

  const body = content.slice(prefix.length).trim();
  const [rawName = '', ...args] = body.split(/\s+/);
  const name = ALIASES[rawName.toLowerCase()] ?? rawName.toLowerCase();
  const rest = body.slice(rawName.length).trim();
  const usage = (text: string): ParsedMessage => ({ type: 'usage', message: `Usage: ${prefix}${text}` });
  const command = (parsed: MusicCommand): ParsedMessage => ({ type: 'command', command: parsed });

  switch (name) {
    case 'play':
      return rest.length > 0 ? command({ name: 'play', query: rest }) : usage('play <song name or link>');
    case 'skip': {
      if (args.length === 0) return command({ name: 'skip', count: 1 });
      const count = parsePositiveInt(args[0]);
      return count ? command({ name: 'skip', count }) : usage('skip [number of tracks]');
    }
    case 'pause':
    case 'resume':
    case 'stop':
    case 'queue':
    case 'nowplaying':
    case 'leave':
    case 'help':
      return command({ name });
    case 'loop':
      return args[0] ? command({ name: 'loop', mode: args[0] }) : usage('loop <off|track|queue>');
    case 'volume': {
      const raw = args[0];
      if (raw === undefined || !/^\d+$/.test(raw)) return usage('volume <0-200>');
      return command({ name: 'volume', volume: Number.parseInt(raw, 10) });
    }
    case 'remove': {
      const position = parsePositiveInt(args[0]);
      return position ? command({ name: 'remove', position }) : usage('remove <position>');
    }
    case 'move': {
      const from = parsePositiveInt(args[0]);
      const to = parsePositiveInt(args[1]);
      return from && to ? command({ name: 'move', from, to }) : usage('move <from> <to>');
    }
    default:
      return null;
  }
}
