import i18n from 'i18next';

import { commonI18nOptions } from './i18nCommon.js';

// no backend: until translations are added, t() returns the english key
await i18n.init({
  ...commonI18nOptions,
  resources: {},
  initImmediate: false,
});

export default i18n;
