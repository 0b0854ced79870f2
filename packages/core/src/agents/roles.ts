import { AgentKey, AgentProfile, EffectiveConfig, ProjectSettings } from '../types/config.types';
import { Role, ROLE_KINDS, RoleKind } from '../types/debate.types';

import { buildSystemMessage } from './prompts/debate-prompts';

/** Role each `debate.agents` entry plays, in speaking order. */
export const ROSTER_ORDER: ReadonlyArray<readonly [AgentKey, RoleKind]> = [
  ['pro', ROLE_KINDS.ADVOCATE_A],
  ['con', ROLE_KINDS.ADVOCATE_B],
  ['mediator', ROLE_KINDS.MEDIATOR],
];

/**
 * Creates an immutable role.
 */
export function createRole(kind: RoleKind, profile: AgentProfile, project: ProjectSettings): Role {
  return Object.freeze({
    kind,
    name: profile.name,
    stance: profile.stance,
    systemMessage: buildSystemMessage(kind, project),
  });
}

/**
 * Builds the fixed roster (Pro, Con, Mediator) from the effective configuration.
 */
export function buildRoster(config: EffectiveConfig): readonly Role[] {
  return Object.freeze(ROSTER_ORDER.map(([key, kind]) => createRole(kind, config.debate.agents[key], config.project)));
}

/**
 * Formats the participant legend, e.g. "Pro (Supports Plan A), Con (Supports Plan B)".
 */
export function formatParticipants(roster: readonly Role[]): string {
  return roster.map((role) => `${role.name} (${role.stance})`).join(', ');
}
