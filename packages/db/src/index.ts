export * from "./schema";

export { closeDb, getDb } from "./get-db";
export type { Db } from "./get-db";
