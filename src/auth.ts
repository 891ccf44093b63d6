import { SignInRequiredError } from "./errors.js";
import type { SessionContext } from "./session.js";

const ACCOUNT_REDIRECT_MS = 5_000;
const VERIFY_SETTLE_MS = 3_000;
const SIGN_IN_POLL_MS = 1_000;

export function pause<E>(context: SessionContext<E>, ms: number): Promise<void> {
  return context.driver.wait(ms, context.signal);
}

function appHost<E>(context: SessionContext<E>): string {
  return new URL(context.config.appUrl).host;
}

function onSignInPage<E>(context: SessionContext<E>): boolean {
  const url = context.driver.currentUrl();
  return context.catalog.noise.signInHosts.some((host) => url.includes(host));
}

function onApplication<E>(context: SessionContext<E>): boolean {
  return context.driver.currentUrl().includes(appHost(context)) && !onSignInPage(context);
}

/**
 * Opens the application root. When the account page shows up instead, picks
 * the first listed account, then leaves the rest to the person at the
 * keyboard until the sign-in budget runs out.
 */
export async function ensureSignedIn<E>(context: SessionContext<E>): Promise<boolean> {
  const { driver, catalog, config, logger } = context;
  await driver.navigate(config.appUrl);
  await pause(context, config.browser.navigationSettleMs);

  if (!onSignInPage(context)) {
    logger.debug(`Signed in (${driver.currentUrl()})`);
    return true;
  }

  logger.info("Account page detected; trying the account chooser");
  const account = await driver.probe(catalog.chain("accountChooser"));
  if (account !== undefined) {
    await driver.click(account, { force: true });
    await pause(context, ACCOUNT_REDIRECT_MS);
    if (onApplication(context)) {
      logger.info("Signed in with the listed account");
      return true;
    }

    const pageText = await driver.pageText().catch(() => "");
    if (catalog.noise.verifyPrompts.some((prompt) => pageText.includes(prompt))) {
      const next = await driver.probe(catalog.chain("verifyNext"));
      if (next !== undefined) {
        await driver.click(next, { force: true });
        await pause(context, VERIFY_SETTLE_MS);
      }
    }
    if (!onSignInPage(context)) {
      await pause(context, VERIFY_SETTLE_MS);
      if (onApplication(context)) {
        return true;
      }
    }
  } else {
    logger.debug("No account entry to pick");
  }

  logger.warn("Sign in to your Google account in the browser window; waiting for the redirect back");
  let waited = 0;
  while (waited < config.browser.signInTimeoutMs) {
    await pause(context, SIGN_IN_POLL_MS);
    waited += SIGN_IN_POLL_MS;
    if (onApplication(context)) {
      logger.info("Signed in; the browser profile keeps the session");
      await pause(context, VERIFY_SETTLE_MS);
      return true;
    }
  }
  logger.error(`Sign-in did not complete within ${Math.round(config.browser.signInTimeoutMs / 1000)}s`);
  return false;
}

export async function requireSignedIn<E>(context: SessionContext<E>): Promise<void> {
  if (!(await ensureSignedIn(context))) {
    throw new SignInRequiredError(context.driver.currentUrl());
  }
}
