/* @vitest-environment jsdom */

import React from "react";
import { cleanup, fireEvent, render, screen } from "@testing-library/react";
import { afterEach, describe, expect, it } from "vitest";

import { SessionPanel } from "../SessionPanel";
import { createSessionStore } from "@/audio/store/sessionStore";
import { createStyleCycler } from "@/audio/session/stylePrompts";

afterEach(() => {
  cleanup();
});

describe("SessionPanel", () => {
  it("edits the default style slot", () => {
    const store = createSessionStore();
    render(<SessionPanel store={store} />);

    fireEvent.change(screen.getByRole("textbox", { name: "Style 1" }), { target: { value: "synthwave" } });
    fireEvent.change(screen.getByRole("slider", { name: "Style 1 weight" }), { target: { value: "0.4" } });

    const [entry] = store.getSnapshot().session.styles;
    expect(entry.text).toBe("synthwave");
    expect(entry.weight).toBe(0.4);
  });

  it("rolls a prompt into the row whose dice was clicked", () => {
    const store = createSessionStore();
    store.addStyle();
    render(<SessionPanel store={store} styleCycler={createStyleCycler(() => 0)} />);

    fireEvent.click(screen.getByRole("button", { name: "Randomize style 2" }));
    fireEvent.click(screen.getByRole("button", { name: "Randomize style 1" }));

    const [first, second] = store.getSnapshot().session.styles;
    expect(second.text).toBe("palm-muted electric guitar");
    expect(first.text).toBe("warmup");
  });

  it("hides the remove button for the last slot", () => {
    render(<SessionPanel store={createSessionStore()} />);
    expect(screen.queryByRole("button", { name: "Remove style 1" })).toBeNull();
  });

  it("adds up to four slots and removes them", () => {
    const store = createSessionStore();
    render(<SessionPanel store={store} />);
    const add = screen.getByRole("button", { name: "Add style" });

    fireEvent.click(add);
    fireEvent.click(add);
    fireEvent.click(add);
    expect(store.getSnapshot().session.styles).toHaveLength(4);
    expect(add.hasAttribute("disabled")).toBe(true);

    fireEvent.click(screen.getByRole("button", { name: "Remove style 2" }));
    expect(store.getSnapshot().session.styles).toHaveLength(3);
    expect(add.hasAttribute("disabled")).toBe(false);
  });

  it("switches bars and sets scalar controls", () => {
    const store = createSessionStore();
    render(<SessionPanel store={store} />);

    fireEvent.click(screen.getByRole("button", { name: "8 bars" }));
    fireEvent.change(screen.getByRole("slider", { name: "Loop Influence" }), { target: { value: "0.5" } });
    fireEvent.change(screen.getByRole("slider", { name: "Temperature" }), { target: { value: "2.5" } });
    fireEvent.change(screen.getByRole("slider", { name: "Top-K" }), { target: { value: "128" } });
    fireEvent.change(screen.getByRole("slider", { name: "Guidance" }), { target: { value: "3" } });

    const { session } = store.getSnapshot();
    expect(session.bars).toBe(8);
    expect(session.loopWeight).toBe(0.5);
    expect(session.temperature).toBe(2.5);
    expect(session.topK).toBe(128);
    expect(session.guidanceWeight).toBe(3);
  });
});
