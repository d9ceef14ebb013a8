/**
 * Member Groups
 *
 * Sorts the members of a type into the navigation groups shown under the
 * type's entry. Overloads share one page, so they collapse to one entry.
 */

import { GROUP_TITLES, type MemberGroupTitle, type MemberModel } from "@apisite/site-schema";

/**
 * A navigation group and the members that represent it.
 */
export interface MemberGroup {
  title: MemberGroupTitle;
  members: MemberModel[];
}

/** Order in which groups appear under a type */
export const MEMBER_GROUP_ORDER: readonly MemberGroupTitle[] = [
  GROUP_TITLES.properties,
  GROUP_TITLES.methods,
  GROUP_TITLES.events,
  GROUP_TITLES.operators,
  GROUP_TITLES.fields,
  GROUP_TITLES.constructors,
  GROUP_TITLES.explicitInterfaceImplementations,
];

/**
 * Get the navigation group of a member.
 *
 * Properties, methods and events that explicitly implement an interface
 * member go to the "Explicit Interface Implementations" group.
 */
export function memberGroupOf(member: MemberModel): MemberGroupTitle {
  switch (member.kind) {
    case "property":
    case "method":
    case "event":
      if (member.isExplicitInterfaceImplementation) {
        return GROUP_TITLES.explicitInterfaceImplementations;
      }
      return member.kind === "property"
        ? GROUP_TITLES.properties
        : member.kind === "method"
          ? GROUP_TITLES.methods
          : GROUP_TITLES.events;
    case "constructor":
      return GROUP_TITLES.constructors;
    case "operator":
      return GROUP_TITLES.operators;
    case "field":
      return GROUP_TITLES.fields;
  }
}

function firstByName(members: readonly MemberModel[]): MemberModel[] {
  const seen = new Set<string>();
  return members.filter((member) => {
    if (seen.has(member.name)) return false;
    seen.add(member.name);
    return true;
  });
}

/**
 * Group members for navigation.
 *
 * Groups follow {@link MEMBER_GROUP_ORDER} and empty groups are left out.
 * Constructors collapse to their first entry; in every other group, members
 * sharing a name collapse to the first occurrence.
 */
export function groupMembers(members: readonly MemberModel[]): MemberGroup[] {
  const buckets = new Map<MemberGroupTitle, MemberModel[]>();

  for (const member of members) {
    const title = memberGroupOf(member);
    const bucket = buckets.get(title);
    if (bucket) {
      bucket.push(member);
    } else {
      buckets.set(title, [member]);
    }
  }

  const groups: MemberGroup[] = [];
  for (const title of MEMBER_GROUP_ORDER) {
    const bucket = buckets.get(title);
    if (!bucket) continue;

    groups.push({
      title,
      members: title === GROUP_TITLES.constructors ? bucket.slice(0, 1) : firstByName(bucket),
    });
  }

  return groups;
}
