// Storage module barrel export

export { SQLiteSiteStore, buildFtsQuery } from "./metadata";
export { LocalVectorStore, cosineSimilarity } from "./vector-store";
