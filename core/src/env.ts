/**
 * Environment variables set by the agent for every hook invocation.
 */

import { z } from "zod";

export const ENV_MODEL_UUID = "JUJU_MODEL_UUID";
export const ENV_UNIT_NAME = "JUJU_UNIT_NAME";
export const ENV_CHARM_DIR = "CHARM_DIR";
export const ENV_CONTEXT_ID = "JUJU_CONTEXT_ID";
export const ENV_AGENT_SOCKET = "JUJU_AGENT_SOCKET";
export const ENV_RELATION_NAME = "JUJU_RELATION";
export const ENV_RELATION_ID = "JUJU_RELATION_ID";
export const ENV_REMOTE_UNIT = "JUJU_REMOTE_UNIT";

/** Variables required by any event run. */
export const REQUIRED_ENV_VARS = [
  ENV_MODEL_UUID,
  ENV_UNIT_NAME,
  ENV_CHARM_DIR,
  ENV_CONTEXT_ID,
  ENV_AGENT_SOCKET,
] as const;

/**
 * Variables additionally required when JUJU_RELATION is set.
 * JUJU_REMOTE_UNIT is checked separately: it is absent for relation-broken.
 */
export const RELATION_ENV_VARS = [ENV_RELATION_NAME, ENV_RELATION_ID] as const;

/** Prefix of the first argument that selects a registered command. */
export const COMMAND_PREFIX = "cmd-";

/** Event name under which wildcard handlers are registered. */
export const WILDCARD_EVENT = "*";

/** Suffix of the event fired when a relation is torn down. */
export const RELATION_BROKEN_SUFFIX = "-relation-broken";

const present = z.string().min(1);

/**
 * Shape of a validated hook environment. Relation fields are optional here;
 * which of them must be present depends on the event being run.
 */
export const HookEnvironmentSchema = z.object({
  [ENV_MODEL_UUID]: present,
  [ENV_UNIT_NAME]: present,
  [ENV_CHARM_DIR]: present,
  [ENV_CONTEXT_ID]: present,
  [ENV_AGENT_SOCKET]: present,
  [ENV_RELATION_NAME]: present.optional(),
  [ENV_RELATION_ID]: present.optional(),
  [ENV_REMOTE_UNIT]: present.optional(),
});

export type HookEnvironment = z.infer<typeof HookEnvironmentSchema>;
