/**
 * Unit and relation identifiers as the agent spells them.
 */

/** A unit name such as "mysql/0". */
export type UnitId = string;

/** A relation instance id such as "db:4". */
export type RelationId = string;

/** Service (application) part of a unit id: "mysql/0" → "mysql". */
export function unitService(unit: UnitId): string {
  const i = unit.lastIndexOf("/");
  return i < 0 ? unit : unit.slice(0, i);
}

/** Relation name part of a relation id: "db:4" → "db". */
export function relationIdName(id: RelationId): string {
  const i = id.indexOf(":");
  return i < 0 ? id : id.slice(0, i);
}
