import { type ReconciliationDriver } from "../dues/driver";
import { type TrelloManager } from "../trello/manager";

/**
 * What command handlers act upon.
 */
export type CommandDeps = {
  driver: ReconciliationDriver;
  trello: TrelloManager;
};
