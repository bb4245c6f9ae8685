// Crawler module barrel export

export { Semaphore } from "./semaphore";
export { HttpFetcher, USER_AGENTS } from "./fetcher";
export { RobotsPolicyGate, formatAuditLine } from "./policy";
export { ContentExtractor, isWithinDomain } from "./extractor";
export { rankTextByQuery, countQueryHits } from "./relevance";
export { SiteCrawler, createSiteCrawler, brandToken, referencePageUrl } from "./crawler";
export {
  SearchOrchestrator,
  createOrchestrator,
  getOrchestrator,
  resetOrchestrator,
  NO_RELEVANT_INFORMATION,
  SUMMARY_UNAVAILABLE,
} from "./orchestrator";
export type { SiteCrawlerLike, MergedCrawl, BuildStatus } from "./orchestrator";
