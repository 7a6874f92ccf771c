import type { ResearchConfig } from "@/lib/config/research";
import type { Capabilities, CapabilityId } from "./contracts";

/**
 * Which optional providers have credentials. Only presence is checked; the
 * secrets themselves are passed through untouched. Run once at startup.
 */
export function probeCapabilities(config: ResearchConfig): Capabilities {
  const available = new Set<CapabilityId>();
  if (config.parallelAi.apiKey) available.add("premium-research");
  if (config.apify.token) available.add("scraper");
  return available;
}
