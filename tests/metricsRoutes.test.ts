import request from "supertest";
import { describe, expect, it } from "vitest";
import { createApp } from "../src/index";
import { DEFAULT_SETTINGS, mergeSettings } from "../src/utils/settings";

const app = createApp(mergeSettings(DEFAULT_SETTINGS, { businessHours: { timezone: "UTC" } }));

const events = [
  { timestamp: "2025-06-02T09:00:00Z", state: "In Progress" },
  { timestamp: "2025-06-02T13:00:00Z", state: "Done" }
];

describe("metrics routes", () => {
  it("exposes the active configuration", async () => {
    const response = await request(app).get("/api/metrics/config");
    expect(response.status).toBe(200);
    expect(response.body.settings.businessHours.timezone).toBe("UTC");
    expect(response.body.settings.minItemsForScoring).toBe(3);
  });

  it("computes a time breakdown", async () => {
    const response = await request(app)
      .post("/api/metrics/time-breakdown")
      .send({ events, asOf: "2025-06-10T00:00:00Z" });
    expect(response.status).toBe(200);
    expect(response.body.breakdown.activeHours).toBe(4);
    expect(response.body.breakdown.isCompleted).toBe(true);
  });

  it("validates request bodies", async () => {
    const response = await request(app).post("/api/metrics/time-breakdown").send({});
    expect(response.status).toBe(400);
    expect(response.body.message).toBe("Validation failed.");
    expect(response.body.errors[0].path).toBe("events");
  });

  it("maps input errors to 400", async () => {
    const response = await request(app)
      .post("/api/metrics/time-breakdown")
      .send({ events: [{ state: "Active" }] });
    expect(response.status).toBe(400);
    expect(response.body.error.code).toBe("INPUT_ERROR");
  });

  it("scores a single work item", async () => {
    const response = await request(app)
      .post("/api/metrics/work-item")
      .send({
        breakdown: {
          activeHours: 6,
          pausedHours: 0,
          preReopenActiveHours: 6,
          postReopenActiveHours: 0,
          wasReopened: false,
          reopenCount: 0
        },
        estimatedHours: 8,
        isCompleted: true,
        targetDate: "2025-06-10",
        closedDate: "2025-06-13"
      });
    expect(response.status).toBe(200);
    expect(response.body.metrics.fairEfficiencyPct).toBeCloseTo(76);
    expect(response.body.metrics.deliveryScore).toBe(95);
    expect(response.body.metrics.deliveryTier).toBe("late_1_3");
  });

  it("maps configuration errors to 422", async () => {
    const response = await request(app)
      .post("/api/metrics/developer-summary")
      .send({ developer: "Ana", items: [], weights: { fairEfficiency: 0.5 } });
    expect(response.status).toBe(422);
    expect(response.body.error.code).toBe("CONFIG_ERROR");
  });

  it("builds a team report", async () => {
    const response = await request(app)
      .post("/api/metrics/report")
      .send({
        asOf: "2025-06-10T00:00:00Z",
        workItems: [{ id: 7, assignedTo: "Ana", estimatedHours: 4, events }]
      });
    expect(response.status).toBe(200);
    expect(response.body.report.overview.totalWorkItems).toBe(1);
    expect(response.body.report.items[0].id).toBe("7");
    expect(response.body.report.developers[0].developer).toBe("Ana");
    expect(response.body.report.developers[0].completedCount).toBe(1);
  });

  it("rejects unknown override sections", async () => {
    const response = await request(app)
      .post("/api/metrics/report")
      .send({ workItems: [], overrides: { holidays: [] } });
    expect(response.status).toBe(400);
  });
});

describe("work item route without history", () => {
  it("marks an empty posted breakdown as ineligible", async () => {
    const response = await request(app)
      .post("/api/metrics/work-item")
      .send({
        breakdown: {
          activeHours: 0,
          pausedHours: 0,
          preReopenActiveHours: 0,
          postReopenActiveHours: 0,
          wasReopened: false,
          reopenCount: 0
        },
        estimatedHours: 8,
        isCompleted: false
      });
    expect(response.status).toBe(200);
    expect(response.body.metrics.ineligibleReason).toBe("no_state_history");
  });
});
