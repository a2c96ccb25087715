/**
 * SessionParameters: defaults, pending-request conversion, CSV accessors, editing.
 */

import { afterEach, describe, it, expect, vi } from "vitest";
import {
  createSessionParameters,
  fromPendingRequest,
  toPendingRequest,
  stylesCSV,
  styleWeightsCSV,
  addStyle,
  removeStyle,
  updateStyle,
  setLoopWeight,
  setBars,
  setTemperature,
  setTopK,
  setGuidanceWeight,
} from "../sessionParameters";
import type { PendingJamRequest, SessionParameters } from "../types";

function request(overrides: Partial<PendingJamRequest> = {}): PendingJamRequest {
  return {
    bpm: 120,
    barsPerChunk: 8,
    styles: ["acid house", "trumpet"],
    styleWeights: [1.0, 0.35],
    loopWeight: 0.6,
    temperature: 1.1,
    topK: 40,
    guidanceWeight: 5,
    ...overrides,
  };
}

function pairs(params: SessionParameters): [string, number][] {
  return params.styles.map((s): [string, number] => [s.text, s.weight]);
}

afterEach(() => {
  vi.restoreAllMocks();
});

describe("createSessionParameters", () => {
  it("starts with one empty style at weight 1.0 and default scalars", () => {
    const p = createSessionParameters();
    expect(pairs(p)).toEqual([["", 1.0]]);
    expect(p.loopWeight).toBe(1.0);
    expect(p.bars).toBe(4);
    expect(p.temperature).toBe(1.2);
    expect(p.topK).toBe(30);
    expect(p.guidanceWeight).toBe(1.5);
  });

  it("gives each session its own style identity", () => {
    expect(createSessionParameters().styles[0].id).not.toBe(createSessionParameters().styles[0].id);
  });
});

describe("fromPendingRequest", () => {
  it("pairs styles with weights and copies scalars verbatim", () => {
    const p = fromPendingRequest(request({ temperature: 9, topK: 5000 }));
    expect(pairs(p)).toEqual([["acid house", 1.0], ["trumpet", 0.35]]);
    expect(p.bars).toBe(8);
    expect(p.loopWeight).toBe(0.6);
    expect(p.temperature).toBe(9);
    expect(p.topK).toBe(5000);
    expect(p.guidanceWeight).toBe(5);
  });

  it("truncates to the shorter sequence and warns", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const p = fromPendingRequest(request({ styles: ["a", "b", "c"], styleWeights: [0.2] }));
    expect(pairs(p)).toEqual([["a", 0.2]]);
    expect(warn).toHaveBeenCalledWith(
      "[Session Params] styles (3) and styleWeights (1) differ in length; keeping the first 1."
    );
  });

  it("assigns fresh identities to identical entries", () => {
    const p = fromPendingRequest(request({ styles: ["lofi", "lofi"], styleWeights: [0.5, 0.5] }));
    expect(p.styles[0].id).not.toBe(p.styles[1].id);
  });
});

describe("toPendingRequest", () => {
  it("flattens styles in order and passes bpm through", () => {
    const p = fromPendingRequest(request());
    expect(toPendingRequest(p, 96)).toEqual({
      bpm: 96,
      barsPerChunk: 8,
      styles: ["acid house", "trumpet"],
      styleWeights: [1.0, 0.35],
      loopWeight: 0.6,
      temperature: 1.1,
      topK: 40,
      guidanceWeight: 5,
    });
  });

  it("round-trips through fromPendingRequest", () => {
    let p = createSessionParameters();
    p = updateStyle(p, p.styles[0].id, { text: "dub techno", weight: 0.8 });
    p = addStyle(p);
    p = updateStyle(p, p.styles[1].id, { text: "cello", weight: 0.25 });
    p = setTemperature(setLoopWeight(p, 0.45), 2.35);
    p = setGuidanceWeight(setTopK(setBars(p, 8), 256), 7.5);

    const back = fromPendingRequest(toPendingRequest(p, 128));
    expect(pairs(back)).toEqual(pairs(p));
    expect(back.loopWeight).toBe(p.loopWeight);
    expect(back.bars).toBe(p.bars);
    expect(back.temperature).toBe(p.temperature);
    expect(back.topK).toBe(p.topK);
    expect(back.guidanceWeight).toBe(p.guidanceWeight);
  });
});

describe("CSV accessors", () => {
  it("joins style texts verbatim", () => {
    const p = fromPendingRequest(request({ styles: ["lofi, hazy", "jazz"], styleWeights: [1, 0.5] }));
    expect(stylesCSV(p)).toBe("lofi, hazy,jazz");
  });

  it("formats style weights with four decimals", () => {
    expect(styleWeightsCSV(fromPendingRequest(request()))).toBe("1.0000,0.3500");
  });

  it("is empty when there are no styles", () => {
    const p = fromPendingRequest(request({ styles: [], styleWeights: [] }));
    expect(stylesCSV(p)).toBe("");
    expect(styleWeightsCSV(p)).toBe("");
  });
});

describe("style editing", () => {
  it("adds empty slots up to four", () => {
    let p = createSessionParameters();
    p = addStyle(addStyle(addStyle(p)));
    expect(p.styles).toHaveLength(4);
    expect(p.styles[3].text).toBe("");
    expect(p.styles[3].weight).toBe(1.0);
    expect(addStyle(p)).toBe(p);
  });

  it("removes by id but keeps the last slot", () => {
    const p = fromPendingRequest(request());
    const removed = removeStyle(p, p.styles[0].id);
    expect(pairs(removed)).toEqual([["trumpet", 0.35]]);
    expect(removeStyle(removed, removed.styles[0].id)).toBe(removed);
  });

  it("ignores unknown ids", () => {
    const p = fromPendingRequest(request());
    expect(removeStyle(p, "missing")).toBe(p);
    expect(updateStyle(p, "missing", { text: "x" })).toBe(p);
  });

  it("updates text and weight in place, keeping identity and order", () => {
    const p = fromPendingRequest(request());
    const id = p.styles[1].id;
    const next = updateStyle(updateStyle(p, id, { text: "flugelhorn" }), id, { weight: 0.9 });
    expect(next.styles[1]).toEqual({ id, text: "flugelhorn", weight: 0.9 });
    expect(next.styles[0]).toBe(p.styles[0]);
  });
});

describe("scalar setters", () => {
  it("assigns without clamping", () => {
    let p = createSessionParameters();
    p = setLoopWeight(p, 1.5);
    p = setTemperature(p, -1);
    p = setGuidanceWeight(p, 12);
    p = setBars(p, 16);
    expect(p.loopWeight).toBe(1.5);
    expect(p.temperature).toBe(-1);
    expect(p.guidanceWeight).toBe(12);
    expect(p.bars).toBe(16);
  });

  it("rounds topK to an integer", () => {
    expect(setTopK(createSessionParameters(), 41.6).topK).toBe(42);
  });

  it("returns the same parameters when a value is unchanged", () => {
    const p = createSessionParameters();
    expect(setBars(p, 4)).toBe(p);
    expect(setTopK(p, 30.2)).toBe(p);
  });
});
