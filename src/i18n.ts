/**
 * i18n Configuration
 * Uses i18next for user-facing messages (errors, CLI output)
 */

import i18n from 'i18next';
import enUS from './locales/en-US.json';
import zhCN from './locales/zh-CN.json';

export const SUPPORTED_UI_LANGUAGES = ['en-US', 'zh-CN'] as const;
export type UiLanguage = (typeof SUPPORTED_UI_LANGUAGES)[number];

// Resources are inline, so initialization completes synchronously
void i18n.init({
  resources: {
    'en-US': { translation: enUS },
    'zh-CN': { translation: zhCN },
  },
  lng: 'en-US',
  fallbackLng: 'en-US',
  initImmediate: false,
  interpolation: {
    escapeValue: false,
  },
});

export const t = i18n.t.bind(i18n);
export const changeLanguage = i18n.changeLanguage.bind(i18n);
export default i18n;
