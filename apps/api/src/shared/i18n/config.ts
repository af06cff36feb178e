import {
  DEFAULT_LOCALES,
  LOCALE_NAMESPACES,
  PRIMARY_LOCALE,
  type LocaleNamespace,
  type SupportedLocale,
  resolveNamespaceFile,
} from "@postural/i18n-tools";
import i18next, { type InitOptions, type Resource, type i18n } from "i18next";
import { readFileSync } from "node:fs";
import { getLogger, toErrorPayload } from "../logger";
import { isRecord } from "../validation/landmarks";

const logger = getLogger("i18n", "server");

const readNamespace = (
  locale: SupportedLocale,
  namespace: LocaleNamespace,
): Record<string, string> => {
  const raw: unknown = JSON.parse(
    readFileSync(resolveNamespaceFile(locale, namespace), "utf8"),
  );

  if (!isRecord(raw)) {
    throw new Error(`Locale file ${locale}/${namespace} is not an object`);
  }

  const entries: Record<string, string> = {};
  Object.entries(raw).forEach(([key, value]) => {
    if (typeof value === "string") {
      entries[key] = value;
    }
  });
  return entries;
};

export const loadLocaleResources = (): Resource => {
  const resources: Resource = {};
  DEFAULT_LOCALES.forEach((locale) => {
    resources[locale] = {};
    LOCALE_NAMESPACES.forEach((namespace) => {
      const bundle = resources[locale];
      if (bundle) {
        bundle[namespace] = readNamespace(locale, namespace);
      }
    });
  });
  return resources;
};

const initOptions: InitOptions = {
  supportedLngs: [...DEFAULT_LOCALES],
  fallbackLng: PRIMARY_LOCALE,
  ns: [...LOCALE_NAMESPACES],
  defaultNS: "errors",
  keySeparator: ".",
  interpolation: {
    escapeValue: false,
  },
  returnNull: false,
  initImmediate: false,
};

const instances = new Map<SupportedLocale, i18n>();

let cachedResources: Resource | null = null;

/**
 * Synchronously initialised translator for one locale. Resources are read
 * from disk once per process and shared between locales.
 */
export const getTranslator = (locale: SupportedLocale = PRIMARY_LOCALE) => {
  const existing = instances.get(locale);
  if (existing) {
    return existing;
  }

  cachedResources ??= loadLocaleResources();

  const instance = i18next.createInstance();
  instance
    .init({ ...initOptions, resources: cachedResources, lng: locale })
    .catch((error: unknown) => {
      logger.error("Failed to initialise translations", {
        locale,
        error: toErrorPayload(error),
      });
    });

  instances.set(locale, instance);
  return instance;
};

export const translate = (
  locale: SupportedLocale,
  namespace: LocaleNamespace,
  key: string,
): string => {
  return getTranslator(locale).t(key, { ns: namespace });
};
