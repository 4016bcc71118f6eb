import type { RoleInfo, RoleName, SpecialAbility, Team } from "./types";

/** Flat role table. Abilities are announced but night actions are not resolved yet. */
export const ROLE_CATALOG: Readonly<Record<RoleName, RoleInfo>> = {
  "Crew Member": {
    name: "Crew Member",
    team: "crew",
    description: "A loyal crew member. Work with others to find the saboteurs!",
    emoji: "👨‍🚀"
  },
  Saboteur: {
    name: "Saboteur",
    team: "saboteur",
    description: "An imposter trying to sabotage the mission. Coordinate with fellow saboteurs!",
    emoji: "🔪"
  },
  "Security Officer": {
    name: "Security Officer",
    team: "crew",
    description: "A crew member with security training. Can investigate one player per night (coming soon).",
    emoji: "🔍",
    special: "investigate"
  },
  Engineer: {
    name: "Engineer",
    team: "crew",
    description: "A crew member who maintains ship systems. Can protect one player per night (coming soon).",
    emoji: "🛡️",
    special: "protect"
  }
};

/** Display order used by distribution summaries. */
export const ROLE_ORDER: readonly RoleName[] = ["Crew Member", "Saboteur", "Security Officer", "Engineer"];

export function isRoleName(value: string): value is RoleName {
  return Object.prototype.hasOwnProperty.call(ROLE_CATALOG, value);
}

/** Looks up a role, falling back to Crew Member for names the catalog does not know. */
export function getRoleInfo(roleName: string): RoleInfo {
  return isRoleName(roleName) ? ROLE_CATALOG[roleName] : ROLE_CATALOG["Crew Member"];
}

export function getTeam(roleName: string): Team {
  return getRoleInfo(roleName).team;
}

export function getSpecialAbility(roleName: string): SpecialAbility | null {
  return getRoleInfo(roleName).special ?? null;
}

export function hasSpecialAbility(roleName: string): boolean {
  return getSpecialAbility(roleName) !== null;
}
