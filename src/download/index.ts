export { HttpFetcher, isRetriableStatus, sha256Hex } from "./fetcher";
export type { ArtifactFetcher, FetchedPayload } from "./fetcher";
export { hashFile, isFile, writeFileAtomic } from "./storage";
