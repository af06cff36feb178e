import path from "node:path";
import { fileURLToPath } from "node:url";

/**
 * Helpers for resolving locale resources from within the npm workspace.
 * The API app imports `@postural/i18n-tools` instead of re-computing
 * where the translation JSON lives relative to its own sources.
 */

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

const packageRoot = path.resolve(__dirname, "..");
const workspaceRoot = path.resolve(packageRoot, "..", "..");

export const LOCALES_ROOT = path.join(workspaceRoot, "apps", "api", "locales");

export const DEFAULT_LOCALES = ["en-US", "ro-RO"] as const;

export type SupportedLocale = (typeof DEFAULT_LOCALES)[number];

export const PRIMARY_LOCALE: SupportedLocale = "en-US";

export const LOCALE_NAMESPACES = ["overlay", "errors"] as const;

export type LocaleNamespace = (typeof LOCALE_NAMESPACES)[number];

export function isSupportedLocale(value: string): value is SupportedLocale {
  return DEFAULT_LOCALES.some((locale) => locale === value);
}

export function resolveNamespaceFile(
  locale: SupportedLocale,
  namespace: LocaleNamespace,
): string {
  return path.join(LOCALES_ROOT, locale, `${namespace}.json`);
}
