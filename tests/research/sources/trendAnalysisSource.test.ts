import type { ApifyClient } from "@/lib/apify";
import { createRequestContext } from "@/src/research/contracts";
import {
  createTrendAnalysisSource,
  nicheHashtags,
  placeholderTrendPayload,
  summarizeTrends,
} from "@/src/research/sources/trendAnalysisSource";
import { silenceLogs } from "../../helpers/research";

const context = createRequestContext({ niche: "fitness_health" });

const posts = [
  {
    type: "Video",
    caption: "Stop doing crunches\nHere is why",
    hashtags: ["#Fitness", "gymtok"],
    likesCount: 500,
    commentsCount: 20,
  },
  { type: "Sidecar", caption: "5 meal prep ideas", hashtags: ["fitness", "mealprep"], likesCount: 50 },
  { type: "Video", caption: "", hashtags: ["fitness"], likesCount: 900 },
  { likesCount: "many" },
];

describe("nicheHashtags", () => {
  it("derives tags from niche and platform", () => {
    expect(nicheHashtags(context)).toEqual(["fitnesshealth", "fitnesshealthtips", "instagramgrowth"]);
  });
});

describe("summarizeTrends", () => {
  it("ranks formats, hooks and hashtags", () => {
    expect(summarizeTrends(posts)).toEqual({
      trending_formats: ["Reels", "Carousels"],
      viral_hooks: ["Stop doing crunches", "5 meal prep ideas"],
      hashtag_trends: ["#fitness", "#gymtok", "#mealprep"],
      simulated: false,
    });
  });

  it("truncates long hooks", () => {
    const caption = "x".repeat(100);

    expect(summarizeTrends([{ caption }]).viral_hooks).toEqual([`${"x".repeat(79)}…`]);
  });

  it("rejects a dataset without posts", () => {
    expect(() => summarizeTrends([{ likesCount: "many" }])).toThrow("trend scrape returned no usable posts");
  });
});

describe("trend analysis source", () => {
  beforeEach(() => silenceLogs());
  afterEach(() => jest.restoreAllMocks());

  it("scrapes the niche hashtags", async () => {
    const runActor = jest.fn<ReturnType<ApifyClient["runActor"]>, Parameters<ApifyClient["runActor"]>>(
      async () => posts
    );
    const source = createTrendAnalysisSource({ client: { runActor }, actorId: "test~hashtags", timeoutMs: 5000 });

    const payload = await source.invoke(context);

    expect(payload.trending_formats).toEqual(["Reels", "Carousels"]);
    expect(runActor).toHaveBeenCalledWith(
      "test~hashtags",
      { hashtags: ["fitnesshealth", "fitnesshealthtips", "instagramgrowth"], resultsLimit: 30 },
      expect.any(AbortSignal)
    );
  });

  it("falls back when the dataset is unusable", async () => {
    const runActor = jest.fn<ReturnType<ApifyClient["runActor"]>, Parameters<ApifyClient["runActor"]>>(
      async () => [{ likesCount: "many" }]
    );
    const source = createTrendAnalysisSource({ client: { runActor }, actorId: "test~hashtags", timeoutMs: 5000 });

    await expect(source.invoke(context)).resolves.toEqual(placeholderTrendPayload(context));
    const [line] = jest.mocked(console.warn).mock.calls[0];
    expect(JSON.parse(String(line))).toMatchObject({ event: "research.source.fallback", reason: "upstream_format" });
  });

  it("uses the placeholder tags offline", async () => {
    const source = createTrendAnalysisSource({ actorId: "test~hashtags", timeoutMs: 5000 });

    const payload = await source.invoke(context);

    expect(payload.hashtag_trends).toEqual(["#fitnesshealth", "#fitnesshealthtips", "#instagramgrowth"]);
    expect(payload.simulated).toBe(true);
  });
});
