import { DateTime } from "luxon";
import { z } from "zod";
import { type CardSource } from "../dues/types";
import { TrelloError, type TrelloClient } from "./client";
import {
  BoardPayloadSchema,
  CardPayloadSchema,
  OrganizationPayloadSchema,
  type Board,
  type Card,
  type Organization,
} from "./schema";

const ORGANIZATION_FIELDS = "id,name,url";
const BOARD_FIELDS = "id,name,url,idOrganization";
const CARD_FIELDS = "id,name,url,due,dueComplete";

function parseList<T extends z.ZodTypeAny>(
  schema: T,
  payload: unknown,
  path: string,
): z.infer<T>[] {
  const result = z.array(schema).safeParse(payload);
  if (!result.success) {
    throw new TrelloError(
      `Unexpected payload from ${path}: ${result.error.message}`,
    );
  }
  return result.data;
}

/**
 * Parses a Trello due string into a zone-aware DateTime.
 */
export function parseDue(due: string | null): DateTime | null {
  if (due === null) {
    return null;
  }
  const parsed = DateTime.fromISO(due, { setZone: true });
  if (!parsed.isValid) {
    throw new TrelloError(`Invalid due date: ${due}`);
  }
  return parsed;
}

/**
 * Manages Trello data and the board/organization whitelists.
 * Everything is blacklisted until explicitly whitelisted by id.
 */
export class TrelloManager implements CardSource {
  private readonly whitelistedOrgs = new Set<string>();
  private readonly whitelistedBoards = new Set<string>();

  constructor(
    private readonly client: TrelloClient,
    initialBoards: Iterable<string> = [],
  ) {
    for (const boardId of initialBoards) {
      this.whitelistedBoards.add(boardId);
    }
  }

  whitelistOrg(orgId: string): void {
    this.whitelistedOrgs.add(orgId);
  }

  blacklistOrg(orgId: string): void {
    this.whitelistedOrgs.delete(orgId);
  }

  whitelistBoard(boardId: string): void {
    this.whitelistedBoards.add(boardId);
  }

  blacklistBoard(boardId: string): void {
    this.whitelistedBoards.delete(boardId);
  }

  async *fetchOrganizations(): AsyncGenerator<Organization> {
    const path = "/members/me/organizations";
    const payload = await this.client.fetchJson(path, { fields: ORGANIZATION_FIELDS });
    for (const o of parseList(OrganizationPayloadSchema, payload, path)) {
      yield {
        id: o.id,
        name: o.name,
        blacklisted: !this.whitelistedOrgs.has(o.id),
        url: o.url,
      };
    }
  }

  /**
   * Looks an organization up by id or name.
   */
  async findOrganization(org: string): Promise<Organization | null> {
    for await (const o of this.fetchOrganizations()) {
      if (o.id === org || o.name === org) {
        return o;
      }
    }
    return null;
  }

  /**
   * Yields boards of the member, or of the organization given by id or name.
   * An unknown organization yields nothing.
   */
  async *fetchBoards(org?: string): AsyncGenerator<Board> {
    if (org === undefined) {
      yield* this.fetchBoardsAt("/members/me/boards");
      return;
    }

    const found = await this.findOrganization(org);
    if (!found) {
      console.log(`[Trello] Unknown organization ${org}`);
      return;
    }
    yield* this.fetchOrganizationBoards(found);
  }

  fetchOrganizationBoards(org: Organization): AsyncGenerator<Board> {
    return this.fetchBoardsAt(`/organizations/${org.id}/boards`);
  }

  async *fetchCards(boardId: string): AsyncGenerator<Card> {
    const path = `/boards/${boardId}/cards`;
    const payload = await this.client.fetchJson(path, { fields: CARD_FIELDS });
    for (const c of parseList(CardPayloadSchema, payload, path)) {
      yield {
        id: c.id,
        name: c.name,
        url: c.url,
        due: parseDue(c.due),
        dueComplete: c.dueComplete,
      };
    }
  }

  private async *fetchBoardsAt(path: string): AsyncGenerator<Board> {
    const payload = await this.client.fetchJson(path, { fields: BOARD_FIELDS });
    for (const b of parseList(BoardPayloadSchema, payload, path)) {
      // Organization membership does not affect board blacklisting
      yield {
        id: b.id,
        name: b.name,
        blacklisted: !this.whitelistedBoards.has(b.id),
        url: b.url,
      };
    }
  }
}
