import { getEnvVar, parseBooleanFlag } from "../env";

type Environment = string;

export type MonitoringConfig = {
  environment: Environment;
  release?: string;
  sentry: {
    dsn: string;
    enabled: boolean;
    tracesSampleRate: number;
  };
  logtail: {
    token: string;
    enabled: boolean;
    consoleOnly: boolean;
  };
};

const resolveEnvironment = (): Environment => {
  const explicitEnv = getEnvVar("APP_ENV") ?? getEnvVar("POSTURAL_ENV");
  if (explicitEnv) {
    return explicitEnv.trim();
  }

  return getEnvVar("NODE_ENV")?.trim() ?? "development";
};

const parseSampleRate = (rawValue: string | undefined): number => {
  const parsedValue = Number.parseFloat(rawValue ?? "0.1");
  if (Number.isNaN(parsedValue)) {
    return 0.1;
  }
  return Math.max(0, Math.min(1, parsedValue));
};

export const createMonitoringConfig = (): MonitoringConfig => {
  const environment = resolveEnvironment();
  const isProductionLike =
    environment === "production" || environment === "staging";

  const sentryDsn = getEnvVar("SENTRY_DSN") ?? "";
  const enableSentryInDev = parseBooleanFlag(
    getEnvVar("ENABLE_SENTRY_IN_DEV"),
    false,
  );
  const sentryEnabled =
    Boolean(sentryDsn) && (isProductionLike || enableSentryInDev);

  const logtailToken = getEnvVar("BETTER_STACK_TOKEN") ?? "";
  const logtailEnabled =
    Boolean(logtailToken) &&
    (isProductionLike ||
      parseBooleanFlag(getEnvVar("ENABLE_BETTER_STACK_IN_DEV"), false));

  return {
    environment,
    release: getEnvVar("npm_package_version"),
    sentry: {
      dsn: sentryDsn,
      enabled: sentryEnabled,
      tracesSampleRate: parseSampleRate(getEnvVar("SENTRY_TRACES_SAMPLE_RATE")),
    },
    logtail: {
      token: logtailToken,
      enabled: logtailEnabled,
      consoleOnly: !logtailEnabled,
    },
  };
};

export const monitoringConfig: MonitoringConfig = createMonitoringConfig();
