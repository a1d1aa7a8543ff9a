import { describe, expect, it } from "vitest";
import { createRunId } from "./runId";

describe("createRunId", () => {
  it("combines the compact UTC start time with a random suffix", () => {
    const id = createRunId(new Date("2026-10-19T08:30:15.123Z"), () => 0.5);

    expect(id).toBe("booru-20261019T083015Z-i00000");
  });

  it("gives different ids to runs started in the same second", () => {
    const startedAt = new Date("2026-10-19T08:30:15Z");

    expect(createRunId(startedAt)).not.toBe(createRunId(startedAt));
  });
});
