/**
 * MongoDB repositories.
 *
 * The only place that talks "Mongo" outside the counter store: collections, queries and
 * upserts, with Zod validation on reads. Business rules live in `modules/*`.
 */
export * from "./published-reports";
export * from "./tracked-channels";
