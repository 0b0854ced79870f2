import { Language, ProjectSettings, ProjectValue } from '../../types/config.types';
import { ROLE_KINDS, RoleKind } from '../../types/debate.types';

const ADVOCATE_A_PROMPT = `You argue for Plan A. Make the strongest case for its strengths and potential, and point out the weaknesses and risks of Plan B sharply.
Build on what the other participants have said: deepen the discussion, rebut their claims and raise additional points.`;

const ADVOCATE_B_PROMPT = `You argue for Plan B. Make the strongest case for its strengths and potential, and point out the weaknesses and risks of Plan A sharply.
Build on what the other participants have said: deepen the discussion, rebut their claims and raise additional points.`;

const MEDIATOR_PROMPT = `You are the mediator. Integrate the arguments of both advocates and move the discussion forward.
In intermediate rounds, lay out the points of contention and draw out further issues worth debating.`;

/** Appended to the mediator's instructions on its last scheduled turn. */
export const MEDIATOR_CLOSING_INSTRUCTIONS = `This is your final turn. Present a third option that keeps at least one element from each side and adds at least one new element.
Close with exactly three bullet groups, labelled "Retained strengths", "Avoided risks" and "New elements".`;

const BASE_PROMPTS: Record<RoleKind, string> = {
  [ROLE_KINDS.ADVOCATE_A]: ADVOCATE_A_PROMPT,
  [ROLE_KINDS.ADVOCATE_B]: ADVOCATE_B_PROMPT,
  [ROLE_KINDS.MEDIATOR]: MEDIATOR_PROMPT,
};

export const LANGUAGE_INSTRUCTIONS: Record<Language, string> = {
  en: 'Always respond in English.',
  ja: 'Always respond in Japanese. Do not use English.',
  zh: 'Always respond in Simplified Chinese. Do not use English.',
};

function formatEntries(entries: Record<string, ProjectValue>): string {
  return Object.entries(entries).map(([key, value]) => `- ${key}: ${String(value)}`).join('\n');
}

/**
 * Renders the project block shared by every role. Empty constraint or condition maps
 * are omitted.
 */
export function buildProjectSection(project: ProjectSettings): string {
  const parts = [`Project: ${project.name}`];
  if (Object.keys(project.constraints).length > 0) {
    parts.push(`Constraints:\n${formatEntries(project.constraints)}`);
  }
  if (Object.keys(project.conditions).length > 0) {
    parts.push(`Conditions:\n${formatEntries(project.conditions)}`);
  }
  return parts.join('\n\n');
}

/**
 * Builds the static system message of a role.
 */
export function buildSystemMessage(kind: RoleKind, project: ProjectSettings): string {
  return [BASE_PROMPTS[kind], buildProjectSection(project), LANGUAGE_INSTRUCTIONS[project.language]].join('\n\n');
}

/**
 * Builds the convener's opening message that seeds the conversation.
 *
 * @param topic - The debate topic.
 * @param maxTurns - Total number of speaker turns.
 * @param speakerNames - Roster names in speaking order.
 */
export function buildOpeningMessage(topic: string, maxTurns: number, speakerNames: readonly string[]): string {
  return `Topic: ${topic}\n\nThis debate runs for ${maxTurns} turns. Speak in this order: ${speakerNames.join(', ')}.`;
}
