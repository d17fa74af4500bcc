/**
 * Transcript formatting helpers
 *
 * Renders a call and its transcript as plain text, and derives the date,
 * time and file names used to lay out the archive.
 */

import type { CallRecord, CallTranscript, Party } from '../../clients/gong/index.js';

const RULE_WIDTH = 80;
const MAX_FILENAME_LENGTH = 200;
const UNSAFE_FILENAME_CHARS = /[<>:"/\\|?*]/g;

export const UNKNOWN_DATE = 'unknown-date';
export const UNKNOWN_TIME = 'unknown-time';

function parseStarted(record: CallRecord): Date | undefined {
  if (!record.started) {
    return undefined;
  }
  const date = new Date(record.started);
  return Number.isNaN(date.getTime()) ? undefined : date;
}

/**
 * Call date as YYYY-MM-DD (UTC), or 'unknown-date'
 */
export function extractCallDate(record: CallRecord): string {
  const started = parseStarted(record);
  return started ? started.toISOString().slice(0, 10) : UNKNOWN_DATE;
}

/**
 * Call start time as HH:MM (UTC), or 'unknown-time'
 */
export function extractCallTime(record: CallRecord): string {
  const started = parseStarted(record);
  return started ? started.toISOString().slice(11, 16) : UNKNOWN_TIME;
}

/**
 * Whole minutes of the call; duration is given in milliseconds
 */
export function extractDurationMinutes(record: CallRecord): number {
  const duration = record.duration ?? 0;
  return duration > 0 ? Math.floor(duration / 60000) : 0;
}

function partyLabel(party: Party): string {
  return party.name || party.emailAddress || 'Unknown';
}

/**
 * Display names of all participants
 */
export function extractParticipants(record: CallRecord): string[] {
  return (record.parties ?? []).map(partyLabel);
}

/**
 * Replace characters that are unsafe in file names and cap the length
 */
export function makeSafeFilename(name: string): string {
  return name.replace(UNSAFE_FILENAME_CHARS, '_').slice(0, MAX_FILENAME_LENGTH);
}

/**
 * Base file name (without extension) of a call's formatted transcript
 */
export function transcriptFileName(record: CallRecord): string {
  return makeSafeFilename(`transcript_${record.id}_${extractCallDate(record)}`);
}

/**
 * [MM:SS] from a millisecond offset
 */
export function formatTimestamp(offsetMs: number): string {
  const totalSeconds = Math.max(0, Math.floor(offsetMs / 1000));
  const minutes = Math.floor(totalSeconds / 60);
  const seconds = totalSeconds % 60;
  return `[${String(minutes).padStart(2, '0')}:${String(seconds).padStart(2, '0')}]`;
}

/**
 * Map speaker ids to participant names where the call lists them
 */
function speakerNames(record: CallRecord): Map<string, string> {
  const names = new Map<string, string>();
  for (const party of record.parties ?? []) {
    if (party.speakerId) {
      names.set(party.speakerId, partyLabel(party));
    }
  }
  return names;
}

/**
 * Render a call transcript as readable text
 *
 * Speakers are shown by participant name when the call's parties carry
 * a matching speakerId, otherwise by speaker id.
 */
export function formatTranscriptText(record: CallRecord, transcript: CallTranscript): string {
  const lines: string[] = [
    '='.repeat(RULE_WIDTH),
    'CALL TRANSCRIPT',
    '='.repeat(RULE_WIDTH),
    `Call ID: ${record.id}`,
    `Date: ${extractCallDate(record)}`,
    `Time: ${extractCallTime(record)}`,
    `Duration: ${extractDurationMinutes(record)} minutes`,
    `Title: ${record.title ?? 'N/A'}`,
    `Direction: ${record.direction ?? 'N/A'}`,
  ];

  const participants = extractParticipants(record);
  if (participants.length > 0) {
    lines.push(`Participants: ${participants.join(', ')}`);
  }

  lines.push('-'.repeat(RULE_WIDTH), '');

  if (transcript.transcript.length === 0) {
    lines.push('No transcript available for this call.');
  } else {
    const names = speakerNames(record);
    for (const monologue of transcript.transcript) {
      const speaker = monologue.speakerId
        ? (names.get(monologue.speakerId) ?? monologue.speakerId)
        : 'Unknown Speaker';
      const label = monologue.topic ? `${speaker} (${monologue.topic})` : speaker;

      for (const sentence of monologue.sentences) {
        lines.push(`${formatTimestamp(sentence.start)} ${label}: ${sentence.text}`);
      }
    }
  }

  lines.push('', '='.repeat(RULE_WIDTH));
  return lines.join('\n');
}
