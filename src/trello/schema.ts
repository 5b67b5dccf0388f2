import { type DateTime } from "luxon";
import { z } from "zod";

/**
 * A Trello organization (workspace)
 */
export type Organization = {
  readonly id: string;
  readonly name: string;
  readonly blacklisted: boolean;
  readonly url: string;
};

/**
 * A Trello board
 */
export type Board = {
  readonly id: string;
  readonly name: string;
  readonly blacklisted: boolean;
  readonly url: string;
};

/**
 * A card snapshot as fetched from Trello. Never mutated after creation.
 */
export type Card = {
  readonly id: string;
  readonly name: string;
  readonly url: string;
  readonly due: DateTime | null;
  readonly dueComplete: boolean;
};

// Raw payloads, only the fields we read

export const OrganizationPayloadSchema = z.object({
  id: z.string(),
  name: z.string(),
  url: z.string(),
});

export const BoardPayloadSchema = z.object({
  id: z.string(),
  name: z.string(),
  url: z.string(),
  idOrganization: z.string().nullable().optional(),
});

export const CardPayloadSchema = z.object({
  id: z.string(),
  name: z.string(),
  url: z.string(),
  due: z.string().nullable(),
  dueComplete: z.boolean(),
});
