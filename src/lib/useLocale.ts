import { useTranslation } from "react-i18next";

import { SUPPORTED_LANGUAGES, lookupIn, type CatalogKey, type InterpolationValues } from "./i18n";
import { LanguageSchema } from "./schemas";

export function useLocale() {
  const { i18n } = useTranslation();
  const currentLocale = LanguageSchema.parse(i18n.language);

  return {
    currentLocale,
    availableLocales: SUPPORTED_LANGUAGES,
    t: (key: CatalogKey, vars?: InterpolationValues) => lookupIn(i18n, key, currentLocale, vars),
  };
}
