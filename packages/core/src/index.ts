/**
 * @leash/core
 *
 * Interfaces, pure logic and errors. Backends live behind their own
 * entry points:
 * - @leash/core/memory: in-process implementations (tests, single process)
 * - @leash/core/redis: shared store and task queue on Redis
 * - @leash/core/github: pull request publisher on the GitHub API
 * - @leash/core/fs: configuration file store
 */

export * as Logger from "./logger";
export * as Store from "./coordination_store";
export * as Events from "./event_bus";
export * as Schemas from "./schemas";
export * as Config from "./config_manager";
export * as ConfigStore from "./config_store";

// Coordination
export * as Registry from "./agent_registry";
export * as Feedback from "./feedback_relay";
export * as Cancellation from "./cancellation";

// Task lifecycle
export * as TaskMachine from "./task_machine";
export * as TaskQueue from "./task_queue";
export * as TaskIntake from "./task_intake";
export * as Worker from "./worker";

// Collaborator boundaries
export * as Chat from "./chat";
export * as PullRequest from "./pull_request";
export * as CodingAgent from "./coding_agent";
export * as Workspace from "./workspace";

// Composition
export { createLeash } from "./leash";
export type { Leash, LeashDependencies } from "./leash";
