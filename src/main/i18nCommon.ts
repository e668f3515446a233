import type { InitOptions } from 'i18next';


export const fallbackLng = 'en';

export const commonI18nOptions: InitOptions = {
  fallbackLng,
  lng: fallbackLng,

  // Messages are written in english and used directly as keys
  keySeparator: false,
  nsSeparator: false,
};
