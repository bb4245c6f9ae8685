// Route handlers barrel export

export { handleHealth } from "./health";
export { handleCrawl } from "./crawl";
export { handleSearch } from "./search";
export { handleIndexStatus } from "./index-status";
export { CrawlBodySchema, SearchBodySchema } from "./schemas";
