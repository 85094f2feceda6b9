import i18next, { type i18n as I18n } from "i18next";
import { initReactI18next } from "react-i18next";

import en from "../locales/en.json";
import sv from "../locales/sv.json";
import { AppErrorException } from "./errors";
import { SUPPORTED_LANGUAGES, type Language } from "./schemas";

export { DEFAULT_LANGUAGE, SUPPORTED_LANGUAGES, type Language } from "./schemas";

/** English is the reference locale: a key used in code must exist there. */
export type CatalogKey = keyof typeof en;

export type CatalogTable = Record<Language, Record<string, string>>;

export type InterpolationValues = Record<string, string | number>;

export type MissingLabel = { language: Language; key: string };

export const CATALOG: CatalogTable = { sv, en };

/** Every (language, key) pair absent from a language but present in another. */
export function validateCatalog(table: CatalogTable): MissingLabel[] {
  const allKeys = new Set<string>();
  for (const language of SUPPORTED_LANGUAGES) {
    Object.keys(table[language]).forEach((k) => allKeys.add(k));
  }

  const missing: MissingLabel[] = [];
  for (const language of SUPPORTED_LANGUAGES) {
    for (const key of [...allKeys].sort()) {
      if (typeof table[language][key] !== "string") missing.push({ language, key });
    }
  }
  return missing;
}

export function lookupIn(instance: I18n, key: string, language: Language, vars?: InterpolationValues): string {
  if (!instance.exists(key, { lng: language })) {
    throw new AppErrorException({ code: "I18N_KEY_UNKNOWN", message: `No "${language}" label for key "${key}"` });
  }
  return instance.t(key, { lng: language, replace: vars });
}

export class Catalog {
  constructor(
    readonly i18n: I18n,
    readonly language: Language
  ) {}

  lookup(key: string, language: Language = this.language, vars?: InterpolationValues): string {
    return lookupIn(this.i18n, key, language, vars);
  }

  t(key: CatalogKey, vars?: InterpolationValues): string {
    return lookupIn(this.i18n, key, this.language, vars);
  }
}

export async function createCatalog(language: Language, table: CatalogTable = CATALOG): Promise<Catalog> {
  const missing = validateCatalog(table);
  if (missing.length > 0) {
    throw new AppErrorException({
      code: "I18N_CATALOG_INCOMPLETE",
      message: `${missing.length} label(s) missing from the catalog`,
      details: missing.map((m) => `${m.language}: ${m.key}`).join("\n"),
    });
  }

  const instance = i18next.createInstance();
  await instance.use(initReactI18next).init({
    resources: Object.fromEntries(SUPPORTED_LANGUAGES.map((lng) => [lng, { translation: table[lng] }])),
    lng: language,
    fallbackLng: false,
    supportedLngs: [...SUPPORTED_LANGUAGES],
    keySeparator: false,
    nsSeparator: false,
    initImmediate: false,
    interpolation: {
      escapeValue: false, // React escapes on output
    },
  });

  return new Catalog(instance, language);
}
