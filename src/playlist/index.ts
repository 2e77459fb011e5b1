/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * index.ts: Playlist generation from discovered channels and their assigned numbers.
 */
import { LOG, escapeM3UAttribute, writeFileAtomic } from "../utils/index.js";
import type { ChannelMapping, DiscoveredChannel, PlaylistOutput, PlaylistRecord } from "../types/index.js";

/* After each assignment run the current scrape is written out twice: a JSON document for tooling and an extended M3U playlist for players. Both list channels in
 * channel-number order, and both carry tvg-chno so a player's lineup matches the ledger.
 */

/**
 * Builds playlist records for the channels of one scrape.
 * @param discovered - Discovered channels, in discovery order.
 * @param mapping - The mapping after the assignment run.
 * @param defaultGroup - Group used for channels without tags.
 * @returns One record per distinct stream path that has a number, sorted by channel number.
 */
export function buildPlaylist(discovered: readonly DiscoveredChannel[], mapping: ChannelMapping, defaultGroup: string): PlaylistRecord[] {

  const records: PlaylistRecord[] = [];
  const seen = new Set<string>();

  for(const channel of discovered) {

    const channelNumber = mapping.get(channel.streamPath);

    if((channelNumber === undefined) || seen.has(channel.streamPath)) {

      continue;
    }

    seen.add(channel.streamPath);

    records.push({

      channel_number: channelNumber,
      group: channel.tags ?? defaultGroup,
      logo: channel.logo ?? "",
      name: channel.name ?? channel.streamPath,
      stream_path: channel.streamPath,
      url: channel.url ?? null
    });
  }

  return records.sort((a, b) => a.channel_number - b.channel_number);
}

/**
 * Renders the JSON playlist.
 * @param records - Playlist records, already sorted.
 * @param generatedAt - Generation time.
 * @returns The document text, with a trailing newline.
 */
export function renderPlaylistJson(records: readonly PlaylistRecord[], generatedAt: Date): string {

  return JSON.stringify({ channels: records, generated_at: generatedAt.toISOString() }, null, 2) + "\n";
}

/**
 * Renders the M3U playlist. Records without a stream URL, or with a line break in it, are left out.
 * @param records - Playlist records, already sorted.
 * @param generatedAt - Generation time.
 * @returns The playlist text, with a trailing newline.
 */
export function renderM3U(records: readonly PlaylistRecord[], generatedAt: Date): string {

  const lines = [ "#EXTM3U", "# Generated at " + generatedAt.toISOString(), "" ];

  for(const record of records) {

    if(!record.url) {

      continue;
    }

    // The URL is a line of its own, so a line break in it would start a forged entry.
    if(/[\r\n]/.test(record.url)) {

      LOG.warn("Leaving channel %d (%s) out of the M3U playlist: its stream URL contains a line break.", record.channel_number, record.stream_path);

      continue;
    }

    // The display name follows the last comma of the #EXTINF line, so commas in it would truncate the name for some players.
    const name = escapeM3UAttribute(record.name.replace(/,/g, " "));

    lines.push([

      "#EXTINF:-1 tvg-id=\"", name, "\" tvg-name=\"", name, "\" tvg-chno=\"", String(record.channel_number), "\" tvg-logo=\"", escapeM3UAttribute(record.logo),
      "\" group-title=\"", escapeM3UAttribute(record.group), "\",", name
    ].join(""));

    lines.push(record.url);
  }

  return lines.join("\n") + "\n";
}

/**
 * Writes the JSON and M3U playlists for one scrape. Does nothing when playlists are disabled.
 * @param discovered - Discovered channels, in discovery order.
 * @param mapping - The mapping after the assignment run.
 * @param output - Playlist settings.
 * @param generatedAt - Generation time. Defaults to now.
 * @returns The records written, or null when playlists are disabled.
 */
export async function writePlaylists(discovered: readonly DiscoveredChannel[], mapping: ChannelMapping, output: PlaylistOutput,
  generatedAt = new Date()): Promise<PlaylistRecord[] | null> {

  if(!output.enabled) {

    LOG.debug("playlist", "Playlist output is disabled.");

    return null;
  }

  const records = buildPlaylist(discovered, mapping, output.defaultGroup);

  await writeFileAtomic(output.jsonFile, renderPlaylistJson(records, generatedAt));
  await writeFileAtomic(output.m3uFile, renderM3U(records, generatedAt));

  LOG.debug("playlist", "Wrote %d channels to %s and %s.", records.length, output.jsonFile, output.m3uFile);

  return records;
}
