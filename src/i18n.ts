import { en, ko, type Translations, type Lang } from "./locales/index.js";

const LOCALES: Record<Lang, Translations> = { en, ko };
let _current: Translations = en;

// Language comes from the session config; nothing is persisted here.
export function setLang(lang: Lang): void {
  _current = LOCALES[lang];
}

export function t(key: keyof Translations): string {
  return _current[key];
}
