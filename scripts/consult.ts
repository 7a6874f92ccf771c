import { loadDotEnvFileIfPresent } from "@/lib/config/dotenv";
import { cfg } from "@/lib/config";
import { loadResearchConfig } from "@/lib/config/research";
import { logError } from "@/lib/observability";
import { createConsultationService } from "@/services/consultationService";
import { buildResearchAggregator } from "@/src/research";

async function main() {
  const query = process.argv.slice(2).join(" ").trim();
  if (!query) {
    throw new Error('Usage: npm run consult -- "<describe your account and goals>"');
  }

  loadDotEnvFileIfPresent(".env");
  const config = loadResearchConfig();
  const service = createConsultationService({ aggregator: buildResearchAggregator(config) });

  const result = await service.consult({ query, userId: cfg.raw("LUNA_USER_ID") });
  console.log(JSON.stringify(result, null, 2));
}

main().catch((err) => {
  logError("consult.failed", err);
  process.exit(1);
});
