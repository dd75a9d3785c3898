import * as p from "@clack/prompts";
import { SERVICES, SERVICE_NAMES, type ServiceId } from "@/sync/types";
import { checkConfig, redirectUri } from "@/sync/config/env";
import { createAuthOrchestrator, createTokenStore } from "@/sync/runtime";
import { createAuthProviders } from "@/sync/auth/providers";
import { planTokenAction } from "@/sync/auth/token-plan";
import { errorMessage } from "@/sync/logger";

function describeExpiry(expiresAt: number | null): string {
  return expiresAt === null ? "no expiry reported" : `expires ${new Date(expiresAt).toISOString()}`;
}

async function chooseServices(preselected: ServiceId[]): Promise<ServiceId[] | null> {
  if (preselected.length > 0) return preselected;

  const selected = await p.multiselect({
    message: "Which services do you want to authorize?",
    options: SERVICES.map((service) => ({ value: service, label: SERVICE_NAMES[service] })),
    initialValues: [...SERVICES],
  });
  if (p.isCancel(selected)) return null;
  return SERVICES.filter((service) => selected.includes(service));
}

/** `anime-sync auth`: walk the user through the browser authorization for each service. */
export async function runInteractiveAuth(preselected: ServiceId[]): Promise<number> {
  p.intro("Anime list sync: authorization");

  const check = checkConfig();
  if (!check.valid) {
    for (const problem of check.problems) p.log.error(problem);
    p.outro("Copy .env.example to .env, fill in the values and try again.");
    return 1;
  }

  const services = await chooseServices(preselected);
  if (!services) {
    p.cancel("Authorization cancelled.");
    return 1;
  }

  p.log.info(`Redirect URI: ${redirectUri(check.env)} (must match your API client settings)`);

  let spinner = p.spinner();
  const auth = createAuthOrchestrator(check.env, {
    prompt: (service, url) => {
      p.note(url, `Open this URL to authorize ${SERVICE_NAMES[service]}`);
      spinner.start(`Waiting for ${SERVICE_NAMES[service]} to redirect back...`);
    },
  });

  let failures = 0;
  for (const service of services) {
    spinner = p.spinner();
    try {
      const record = await auth.authenticate(service);
      spinner.stop(`${SERVICE_NAMES[service]} authorized (${describeExpiry(record.expiresAt)}).`);
    } catch (error) {
      failures += 1;
      spinner.stop(`${SERVICE_NAMES[service]} authorization failed.`, 1);
      p.log.error(errorMessage(error));
    }
  }

  if (failures > 0) {
    p.outro("Some services are not authorized. Run `anime-sync auth` again to retry.");
    return 1;
  }
  p.outro("All set. Run `anime-sync run` to start syncing.");
  return 0;
}

/** `anime-sync status`: report whether each stored token can be used by the next cycle. */
export async function runStatusCheck(): Promise<number> {
  p.intro("Anime list sync: token status");

  const check = checkConfig();
  if (!check.valid) {
    for (const problem of check.problems) p.log.error(problem);
    p.outro("Configuration is invalid.");
    return 1;
  }

  const store = createTokenStore(check.env);
  const providers = createAuthProviders(check.env);
  const tokens = await store.load();
  const now = Date.now();
  let healthy = true;

  for (const service of SERVICES) {
    const record = tokens[service];
    const expired = record ? store.isExpired(record, now) : false;
    const plan = planTokenAction(record, expired, providers[service].canRefresh);
    const name = SERVICE_NAMES[service];

    switch (plan.action) {
      case "use":
        p.log.success(`${name}: valid, ${describeExpiry(plan.record.expiresAt)}`);
        break;
      case "refresh":
        p.log.warn(`${name}: expired, will be refreshed on the next sync`);
        break;
      case "authenticate":
        healthy = false;
        p.log.error(`${name}: no token stored. Run \`anime-sync auth --service ${service}\``);
        break;
      case "manual":
        healthy = false;
        p.log.error(`${name}: expired and cannot be refreshed. Run \`anime-sync auth --service ${service}\``);
        break;
    }
  }

  p.outro(healthy ? `Tokens read from ${store.path}` : "Some services need authorization.");
  return healthy ? 0 : 1;
}
