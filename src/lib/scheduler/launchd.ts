/**
 * launchd property list rendering
 *
 * One StartCalendarInterval entry per trigger instant. launchd accepts
 * Weekday 1-7 with 7 = Sunday, the same numbering the compiler uses.
 * Every entry runs the same program (`weekblock run`), which looks up the
 * active interval itself; stop instants therefore end up as informational
 * runs.
 */

import { LAUNCHD_LABEL } from '../env';
import type { CompiledSchedule } from '../../types/schedule';

export interface LaunchdPlistOptions {
  /** Program and arguments launchd executes at every trigger */
  programArguments: readonly string[];
  /** Job label (defaults to LAUNCHD_LABEL) */
  label?: string;
  /** Also run once when the job is loaded (default true) */
  runAtLoad?: boolean;
}

const XML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&apos;',
};

/**
 * Escape text for an XML element body
 */
export function escapeXml(value: string): string {
  return value.replace(/[&<>"']/g, (char) => XML_ESCAPES[char] ?? char);
}

/**
 * Render the launchd job definition for a compiled schedule
 */
export function renderLaunchdPlist(
  compiled: CompiledSchedule,
  options: LaunchdPlistOptions
): string {
  const label = options.label ?? LAUNCHD_LABEL;
  const runAtLoad = options.runAtLoad ?? true;

  const lines: string[] = [
    '<?xml version="1.0" encoding="UTF-8"?>',
    '<!DOCTYPE plist PUBLIC "-//Apple//DTD PLIST 1.0//EN" "http://www.apple.com/DTDs/PropertyList-1.0.dtd">',
    '<plist version="1.0">',
    '<dict>',
    '  <key>Label</key>',
    `  <string>${escapeXml(label)}</string>`,
    '  <key>ProgramArguments</key>',
    '  <array>',
    ...options.programArguments.map((arg) => `    <string>${escapeXml(arg)}</string>`),
    '  </array>',
    '  <key>StartCalendarInterval</key>',
    '  <array>',
  ];

  for (const trigger of compiled.triggers) {
    lines.push(
      '    <dict>',
      '      <key>Weekday</key>',
      `      <integer>${trigger.weekday}</integer>`,
      '      <key>Hour</key>',
      `      <integer>${trigger.hour}</integer>`,
      '      <key>Minute</key>',
      `      <integer>${trigger.minute}</integer>`,
      '    </dict>'
    );
  }

  lines.push(
    '  </array>',
    '  <key>RunAtLoad</key>',
    runAtLoad ? '  <true/>' : '  <false/>',
    '</dict>',
    '</plist>'
  );

  return lines.join('\n') + '\n';
}
