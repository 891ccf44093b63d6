import { describe, expect, it } from "vitest";
import { chatHistory, detectMode, formatNote, saveNote, saveResponseAsNote, smartChat } from "../src/chat.js";
import { FakePage, fakeContext } from "./helpers/fakePage.js";

const NAVIGATE = "navigate https://notebooklm.google.com";
const ANSWER = "The tides are driven mainly by the gravitational pull of the moon.";

function notebookPage(): FakePage {
  const page = new FakePage();
  page.add("notebook", { text: "Tide Log" });
  page.add("chatInput");
  return page;
}

describe("smartChat", () => {
  it("sends the question and returns the settled answer", async () => {
    const page = notebookPage();
    page.add("responseMessages", { text: ANSWER });

    const outcome = await smartChat(fakeContext(page), "Tide Log", "What drives the tides?");

    expect(outcome).toEqual({
      status: "complete",
      text: ANSWER,
      elapsedMs: 5_000,
      ticks: 4,
      stableCount: 3,
      sawInProgress: false
    });
    expect(page.actions).toEqual([
      NAVIGATE,
      "click notebook",
      "click chatInput",
      "fill chatInput What drives the tides?",
      "press chatInput Enter"
    ]);
  });

  it("clears an open source search before chatting", async () => {
    const page = notebookPage();
    page.add("responseMessages", { text: ANSWER });
    page.add("sourceSearchModeInput");
    page.add("pendingResults");
    page.add("discardResults", {
      onClick: (target) => {
        target.removeAll("pendingResults");
        target.removeAll("sourceSearchModeInput");
        target.add("searchInput");
      }
    });

    await smartChat(fakeContext(page), "Tide Log", "What drives the tides?");

    expect(page.actions.slice(0, 4)).toEqual([NAVIGATE, "click notebook", "click discardResults", "click chatInput"]);
  });

  it("falls back to the chat area text after the budget runs out", async () => {
    const page = notebookPage();
    page.add("chatArea", {
      text: "Earlier reply\nGetting the context for your question\nSpring tides follow full moons."
    });
    const context = fakeContext(page, { config: { generation: { startWaitMs: 0 } } });

    const outcome = await smartChat(context, "Tide Log", "When are spring tides?", { maxWaitMs: 3_000 });

    expect(outcome).toEqual({
      status: "timed_out",
      text: "Spring tides follow full moons.",
      elapsedMs: 3_000,
      ticks: 3,
      stableCount: 0,
      sawInProgress: false
    });
  });
});

describe("detectMode", () => {
  it("prefers the source-search surface over the chat input", async () => {
    const page = new FakePage();
    await expect(detectMode(fakeContext(page))).resolves.toBe("unknown");

    page.add("chatInput");
    await expect(detectMode(fakeContext(page))).resolves.toBe("chat");

    page.add("sourceSearchModeInput");
    await expect(detectMode(fakeContext(page))).resolves.toBe("source_search");
  });
});

describe("notes", () => {
  it("formats a titled note as markdown", () => {
    expect(formatNote("Body", "Tides")).toBe("# Tides\n\nBody");
    expect(formatNote("Body")).toBe("Body");
  });

  it("saves with the keyboard shortcut when there is no save control", async () => {
    const page = new FakePage();
    page.add("notebook", { text: "Tide Log" });
    page.add("noteInput");

    await saveNote(fakeContext(page), "Tide Log", "Body", "Tides");

    expect(page.actions).toEqual([
      NAVIGATE,
      "click notebook",
      "fill noteInput # Tides\n\nBody",
      "press noteInput Control+Enter"
    ]);
  });

  it("uses the add-note and save controls when present", async () => {
    const page = new FakePage();
    page.add("notebook", { text: "Tide Log" });
    page.add("addNote");
    page.add("noteInput");
    page.add("noteSave");

    await saveNote(fakeContext(page), "Tide Log", "Body");

    expect(page.actions.slice(2)).toEqual(["click addNote", "fill noteInput Body", "click noteSave"]);
  });

  it("reports a missing save-as-note control", async () => {
    const page = new FakePage();
    await expect(saveResponseAsNote(fakeContext(page))).resolves.toBe(false);

    page.add("saveAsNote");
    await expect(saveResponseAsNote(fakeContext(page))).resolves.toBe(true);
    expect(page.actions).toEqual(["click saveAsNote"]);
  });
});

describe("chatHistory", () => {
  const longAnswer = `Tides follow the moon. ${"The bulge of water moves as the earth turns. ".repeat(5)}`.trim();

  it("reads turns from the message elements", async () => {
    const page = new FakePage();
    page.add("notebook", { text: "Tide Log" });
    page.add("chatMessages", { text: "What drives the tides?" });
    page.add("chatMessages", { text: "thumb_up" });
    page.add("chatMessages", { text: longAnswer });
    page.add("chatMessages", { text: "What drives the tides?" });

    await expect(chatHistory(fakeContext(page), "Tide Log")).resolves.toEqual([
      { role: "user", content: "What drives the tides?" },
      { role: "assistant", content: longAnswer }
    ]);
  });

  it("falls back to page text and applies the limit", async () => {
    const page = new FakePage();
    page.add("notebook", { text: "Tide Log" });
    page.bodyText = "What drives the tides?\nThe moon pulls the oceans toward it.\nthumb_up";

    await expect(chatHistory(fakeContext(page), "Tide Log", 1)).resolves.toEqual([
      { role: "user", content: "What drives the tides?" }
    ]);
  });
});
