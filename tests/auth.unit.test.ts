import { describe, expect, it } from "vitest";
import { ensureSignedIn, requireSignedIn } from "../src/auth.js";
import { SignInRequiredError } from "../src/errors.js";
import { FakePage, fakeContext } from "./helpers/fakePage.js";

const APP_URL = "https://notebooklm.google.com";
const SIGN_IN_URL = "https://accounts.google.com/signin";

describe("ensureSignedIn", () => {
  it("passes straight through when the app opens", async () => {
    const page = new FakePage();

    await expect(ensureSignedIn(fakeContext(page))).resolves.toBe(true);
    expect(page.actions).toEqual([`navigate ${APP_URL}`]);
    expect(page.waits).toEqual([5_000]);
  });

  it("picks the listed account on the account page", async () => {
    const page = new FakePage();
    page.onNavigate = () => SIGN_IN_URL;
    page.add("accountChooser", {
      onClick: (target) => {
        target.url = `${APP_URL}/`;
      }
    });

    await expect(ensureSignedIn(fakeContext(page))).resolves.toBe(true);
    expect(page.actions).toEqual([`navigate ${APP_URL}`, "click accountChooser"]);
  });

  it("waits for the person at the keyboard to finish signing in", async () => {
    const page = new FakePage();
    page.onNavigate = () => SIGN_IN_URL;
    page.onWait = (target) => {
      if (target.clockMs === 8_000) {
        target.url = `${APP_URL}/notebook/abc`;
      }
    };

    await expect(ensureSignedIn(fakeContext(page))).resolves.toBe(true);
    expect(page.waits).toEqual([5_000, 1_000, 1_000, 1_000, 3_000]);
  });

  it("gives up after the sign-in budget", async () => {
    const page = new FakePage();
    page.onNavigate = () => SIGN_IN_URL;
    const context = fakeContext(page, { config: { browser: { signInTimeoutMs: 3_000 } } });

    await expect(requireSignedIn(context)).rejects.toBeInstanceOf(SignInRequiredError);
    await expect(requireSignedIn(context)).rejects.toThrow(
      `Still on the sign-in page (${SIGN_IN_URL}); run 'nbpilot login' and sign in first`
    );
  });
});
