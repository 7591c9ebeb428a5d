/**
 * Catalog Repository
 *
 * Read model over conferences, ticket types and add-ons. Operators own these
 * rows; the commerce core never writes them.
 */

import type { Database } from "better-sqlite3";
import type { AddOn, AddOnRow, ConferenceRow, TicketTypeRow } from "../domain/commerce";

export class CatalogRepository {
  constructor(private readonly db: Database) {}

  getConference(id: number): ConferenceRow | undefined {
    return this.db.prepare<[number], ConferenceRow>("SELECT * FROM conferences WHERE id = ?").get(id);
  }

  getConferenceBySlug(slug: string): ConferenceRow | undefined {
    return this.db.prepare<[string], ConferenceRow>("SELECT * FROM conferences WHERE slug = ?").get(slug);
  }

  getTicketType(id: number): TicketTypeRow | undefined {
    return this.db.prepare<[number], TicketTypeRow>("SELECT * FROM ticket_types WHERE id = ?").get(id);
  }

  getAddon(id: number): AddOn | undefined {
    const row = this.db.prepare<[number], AddOnRow>("SELECT * FROM addons WHERE id = ?").get(id);
    if (!row) return undefined;
    return { ...row, required_ticket_type_ids: this.listRequiredTicketTypeIds(id) };
  }

  listRequiredTicketTypeIds(addonId: number): number[] {
    return this.db
      .prepare<[number], { ticket_type_id: number }>(
        "SELECT ticket_type_id FROM addon_required_ticket_types WHERE addon_id = ? ORDER BY ticket_type_id"
      )
      .all(addonId)
      .map((row) => row.ticket_type_id);
  }
}
