import { Collection, type CollectionOptions } from "./collection";
import { parseCollectionSettings } from "./settings";

export * from "./clock";
export * from "./collection";
export * from "./compliance";
export * from "./errors";
export * from "./events";
export * from "./funds";
export * from "./guard";
export * from "./logger";
export * from "./math";
export * from "./merkle";
export * from "./participants";
export * from "./registry";
export * from "./relayer";
export * from "./roles";
export * from "./settings";
export * from "./stage";
export * from "./treasury";
export * from "./types";

/** Parses raw settings (e.g. a JSON config file) and creates the collection. */
export function createCollection(input: unknown, opts: CollectionOptions = {}): Collection {
    return new Collection(parseCollectionSettings(input), opts);
}
