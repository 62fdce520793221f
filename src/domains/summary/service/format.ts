/**
 * @fileoverview Formatting shared by generated and deterministic summaries.
 */

/** Section headings shared by the generated and the composed brief. */
export const BRIEF_SECTIONS = [
  'Executive Overview',
  'Priority Actions',
  'Key Themes',
  'Task Summary',
  'Sender Analysis',
] as const;

export type BriefSection = (typeof BRIEF_SECTIONS)[number];

export function sectionHeading(section: BriefSection): string {
  return `**${section}**:`;
}

/**
 * True when every brief heading appears in the text. Accepts both
 * `**Heading**:` and `**Heading:**`.
 */
export function hasAllBriefSections(text: string): boolean {
  return BRIEF_SECTIONS.every((section) => text.includes(`**${section}`));
}

/**
 * Human-facing sender name: the text before `<` when present,
 * otherwise the local part of the address.
 */
export function senderDisplayName(sender: string): string {
  if (sender.includes('<')) {
    return sender.split('<')[0].trim();
  }
  return sender.split('@')[0];
}
