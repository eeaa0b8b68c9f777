import { describe, it, expect, vi } from "vitest";
import { createMemoryLogger } from "../logging/logger.js";
import type { CategoryMap, Finding } from "../types.js";
import { AI_API_KEY_ENV, InsightEngine } from "./engine.js";
import { BasicRecommendationStrategy, EnhancedRecommendationStrategy, type RecommendationStrategy } from "./strategies.js";

function bucket(count: number, savings: number, items: Finding[] = []) {
  return { count, savings, items };
}

const exampleCategories = (): CategoryMap => ({
  "EC2 Instances": bucket(23, 18_450),
  "EBS Volumes": bucket(156, 12_340),
  "Elastic IPs": bucket(12, 43.2),
});

describe("InsightEngine (basic)", () => {
  it("ranks the example run by savings with the expected scores", () => {
    const engine = new InsightEngine({ logger: createMemoryLogger().logger });
    const outcome = engine.enhance(exampleCategories());

    expect(outcome.status).toBe("ok");
    expect(outcome.mode).toBe("basic");
    expect(outcome.recommendations).toEqual([
      {
        category: "EC2 Instances",
        priority: "High",
        findingCount: 23,
        totalSavings: 18_450,
        averageSavingsPerItem: 18_450 / 23,
        recommendation: "Review and rightsize or terminate idle instances",
        riskLevel: "Medium",
        effort: "Medium",
      },
      {
        category: "EBS Volumes",
        priority: "High",
        findingCount: 156,
        totalSavings: 12_340,
        averageSavingsPerItem: 12_340 / 156,
        recommendation: "Delete unattached volumes or create snapshots",
        riskLevel: "Low",
        effort: "Low",
      },
      {
        category: "Elastic IPs",
        priority: "Medium",
        findingCount: 12,
        totalSavings: 43.2,
        averageSavingsPerItem: 43.2 / 12,
        recommendation: "Release unattached Elastic IPs",
        riskLevel: "Very Low",
        effort: "Low",
      },
    ]);
  });

  it("skips categories with no findings", () => {
    const engine = new InsightEngine({ logger: createMemoryLogger().logger });
    const outcome = engine.enhance({ "EBS Volumes": bucket(0, 0), "Elastic IPs": bucket(1, 3.6) });

    expect(outcome.recommendations.map((r) => r.category)).toEqual(["Elastic IPs"]);
  });

  it("returns an empty list for an empty map", () => {
    const engine = new InsightEngine({ logger: createMemoryLogger().logger });
    expect(engine.enhance({}).recommendations).toEqual([]);
  });

  it("keeps insertion order for equal savings", () => {
    const engine = new InsightEngine({ logger: createMemoryLogger().logger });
    const outcome = engine.enhance({ A: bucket(1, 500), B: bucket(1, 500), C: bucket(1, 900) });

    expect(outcome.recommendations.map((r) => r.category)).toEqual(["C", "A", "B"]);
  });

  it("scores unknown categories with the generic profile", () => {
    const engine = new InsightEngine({ logger: createMemoryLogger().logger });
    const [rec] = engine.enhance({ "Lambda Functions": bucket(2, 20) }).recommendations;

    expect(rec).toMatchObject({
      recommendation: "Review and optimize resources",
      riskLevel: "Very Low",
      effort: "Medium",
      priority: "Low",
      averageSavingsPerItem: 10,
    });
  });

  it("does not mutate the category map", () => {
    const engine = new InsightEngine({ logger: createMemoryLogger().logger });
    const categories = exampleCategories();
    engine.enhance(categories);
    expect(categories).toEqual(exampleCategories());
  });
});

describe("InsightEngine (enhanced)", () => {
  it("downgrades to basic when the API key is missing", () => {
    const { logger, transport } = createMemoryLogger();
    const engine = new InsightEngine({ enabled: true, env: {}, logger });

    expect(engine.requestedMode).toBe("enhanced");
    expect(engine.activeMode).toBe("basic");
    expect(transport.messages("warn")).toEqual([
      `AI features enabled but ${AI_API_KEY_ENV} not set; using basic recommendations`,
    ]);

    const outcome = engine.enhance(exampleCategories());
    expect(outcome).toMatchObject({ status: "degraded", mode: "basic", reason: "missing-credential" });
    expect(outcome.recommendations).toEqual(new BasicRecommendationStrategy().generate(exampleCategories()));
  });

  it("uses the enhanced strategy when the key is present", () => {
    const engine = new InsightEngine({
      enabled: true,
      model: "gpt-4o",
      env: { [AI_API_KEY_ENV]: "test-secret" },
      logger: createMemoryLogger().logger,
    });

    expect(engine.activeMode).toBe("enhanced");
    const outcome = engine.enhance(exampleCategories());
    expect(outcome.status).toBe("ok");
    expect(outcome.mode).toBe("enhanced");
    expect(outcome.recommendations.map((r) => r.category)).toEqual(["EC2 Instances", "EBS Volumes", "Elastic IPs"]);
  });

  it("passes model and key to the strategy factory", () => {
    const factory = vi.fn((opts: { model: string; apiKey: string }) => new EnhancedRecommendationStrategy(opts));
    new InsightEngine({
      enabled: true,
      model: "gpt-4o",
      env: { [AI_API_KEY_ENV]: "test-secret" },
      logger: createMemoryLogger().logger,
      createEnhancedStrategy: factory,
    });

    expect(factory).toHaveBeenCalledTimes(1);
    expect(factory.mock.calls[0]?.[0]).toMatchObject({ model: "gpt-4o", apiKey: "test-secret" });
  });

  it("falls back to basic when the enhanced strategy throws", () => {
    const failing: RecommendationStrategy = {
      mode: "enhanced",
      generate: () => {
        throw new Error("upstream timeout");
      },
    };
    const { logger, transport } = createMemoryLogger();
    const engine = new InsightEngine({
      enabled: true,
      env: { [AI_API_KEY_ENV]: "test-secret" },
      logger,
      createEnhancedStrategy: () => failing,
    });

    const outcome = engine.enhance(exampleCategories());
    expect(outcome).toMatchObject({
      status: "degraded",
      mode: "basic",
      reason: "enhanced-failed",
      message: "upstream timeout",
    });
    expect(outcome.recommendations).toHaveLength(3);
    expect(transport.messages("warn")).toEqual([
      "AI enhancement failed, using basic recommendations: upstream timeout",
    ]);
  });
});
