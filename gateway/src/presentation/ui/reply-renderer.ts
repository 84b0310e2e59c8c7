import { EmbedBuilder } from 'discord.js';
import { formatDuration, type SessionNotice, type SessionSnapshot, type TrackDescriptor } from '@music-bot/audio';
import type { MusicReply } from '../../application/music-dispatcher.js';

export const QUEUE_PAGE_SIZE = 10;

const COLOR_PRIMARY = 0x6a0dad;
const COLOR_ERROR = 0xff0000;

export interface RenderedReply {
  content?: string;
  embeds?: EmbedBuilder[];
}

const requester = (track: TrackDescriptor) => `<@${track.requestedBy}>`;

function trackLine(track: TrackDescriptor): string {
  return `**${track.title}** (${formatDuration(track.durationSeconds)})`;
}

export function buildQueuedEmbed(track: TrackDescriptor, position: number, started: boolean): EmbedBuilder {
  const embed = new EmbedBuilder()
    .setColor(COLOR_PRIMARY)
    .setTitle(started ? '🎶 Now Playing' : '✅ Queued')
    .setDescription(track.sourceUrl ? `[${track.title}](${track.sourceUrl})` : `**${track.title}**`)
    .addFields({ name: 'Duration', value: formatDuration(track.durationSeconds), inline: true });

  if (!started) {
    embed.addFields({ name: 'Position', value: `#${position}`, inline: true });
  }
  return embed.addFields({ name: 'Requested by', value: requester(track), inline: true });
}

/** Now playing plus the next ten tracks, numbered the way remove/move expect. */
export function buildQueueEmbed(snapshot: SessionSnapshot): EmbedBuilder {
  const embed = new EmbedBuilder().setColor(COLOR_PRIMARY).setTitle('🎵 Queue');

  if (snapshot.current) {
    const paused = snapshot.state === 'paused' ? ' ⏸️' : '';
    embed.addFields({ name: `Now playing${paused}`, value: `${trackLine(snapshot.current)} - ${requester(snapshot.current)}` });
  }

  if (snapshot.upcoming.length > 0) {
    const lines = snapshot.upcoming
      .slice(0, QUEUE_PAGE_SIZE)
      .map((track, index) => `${index + 1}. ${trackLine(track)} - ${requester(track)}`);
    const hidden = snapshot.upcoming.length - QUEUE_PAGE_SIZE;
    if (hidden > 0) lines.push(`...and ${hidden} more`);
    embed.addFields({ name: 'Up next', value: lines.join('\n') });
  }

  return embed.setFooter({ text: `Loop: ${snapshot.loopMode} • Volume: ${snapshot.volume}%` });
}

export function buildHelpEmbed(prefix: string): EmbedBuilder {
  const commands: Array<[string, string]> = [
    ['play <song or link>', 'Play a song or add it to the queue'],
    ['skip [n]', 'Skip the current track (or n tracks)'],
    ['pause', 'Pause playback'],
    ['resume', 'Resume playback'],
    ['stop', 'Stop and clear the queue'],
    ['queue', 'Show the queue'],
    ['np', 'Show the current track'],
    ['loop <off|track|queue>', 'Set the loop mode'],
    ['volume <0-200>', 'Set the volume'],
    ['remove <n>', 'Remove a track from the queue'],
    ['move <from> <to>', 'Move a track in the queue'],
    ['leave', 'Leave the voice channel'],
  ];

  return new EmbedBuilder()
    .setColor(COLOR_PRIMARY)
    .setTitle('🎵 Music commands')
    .setDescription(commands.map(([usage, description]) => `\`${prefix}${usage}\` - ${description}`).join('\n'));
}

export function renderReply(reply: MusicReply): RenderedReply {
  switch (reply.kind) {
    case 'queued':
      return { embeds: [buildQueuedEmbed(reply.track, reply.position, reply.started)] };
    case 'skipped':
      return {
        content: reply.tracks.length === 1 ? `⏭️ Skipped **${reply.tracks[0]?.title}**` : `⏭️ Skipped ${reply.tracks.length} tracks`,
      };
    case 'paused':
      return { content: '⏸️ Paused' };
    case 'resumed':
      return { content: '▶️ Resumed' };
    case 'stopped':
      return { content: '⏹️ Stopped playback and cleared the queue' };
    case 'left':
      return { content: '👋 Left the voice channel' };
    case 'queue':
      return { embeds: [buildQueueEmbed(reply.snapshot)] };
    case 'now_playing':
      return { content: `🎶 Now playing ${trackLine(reply.track)}, requested by ${requester(reply.track)}` };
    case 'loop':
      return { content: `🔁 Loop mode: **${reply.mode}**` };
    case 'volume':
      return { content: `🔊 Volume set to **${reply.volume}%**` };
    case 'removed':
      return { content: `🗑️ Removed **${reply.track.title}**` };
    case 'moved':
      return { content: `↕️ Moved **${reply.track.title}** to position ${reply.position}` };
    case 'help':
      return { embeds: [buildHelpEmbed(reply.prefix)] };
    case 'info':
      return { content: reply.message };
    case 'error':
      return { embeds: [new EmbedBuilder().setColor(COLOR_ERROR).setDescription(reply.message)] };
  }
}

/** Text posted to the command channel for playback events; null when nothing should be said. */
export function renderNotice(notice: SessionNotice): string | null {
  switch (notice.type) {
    case 'track_started':
      return `🎶 Now playing ${trackLine(notice.track)}, requested by ${requester(notice.track)}`;
    case 'track_failed':
      return `⚠️ Couldn't play **${notice.track.title}**, skipping it.`;
    case 'queue_ended':
      return '✅ Queue finished.';
    case 'connection_failed':
      return "⚠️ I couldn't join the voice channel to continue playback.";
    case 'connection_lost':
      return '⚠️ I was disconnected from the voice channel.';
    case 'failure_limit_reached':
      return `⚠️ ${notice.failures} tracks in a row failed, so I stopped. ${notice.remaining} track(s) are still queued; use play to continue.`;
    case 'idle_disconnect':
      return '👋 Left the voice channel after being idle.';
  }
}
