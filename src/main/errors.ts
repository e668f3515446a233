import i18n from './i18n.js';


export class DrpFormatError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'DrpFormatError';
  }
}

export class MalformedHeaderError extends DrpFormatError {
  constructor(reason: string) {
    super(`${i18n.t('Invalid header line in switcher log')}: ${reason}`);
    this.name = 'MalformedHeaderError';
  }
}

export class MalformedEventError extends DrpFormatError {
  constructor(public readonly lineNumber: number, reason: string) {
    super(`${i18n.t('Invalid switch event on line')} ${lineNumber}: ${reason}`);
    this.name = 'MalformedEventError';
  }
}

export class MissingSourcesError extends DrpFormatError {
  constructor() {
    super(i18n.t('No sources in switcher log'));
    this.name = 'MissingSourcesError';
  }
}

export class NoEventsError extends DrpFormatError {
  constructor() {
    super(i18n.t('No switch events in switcher log'));
    this.name = 'NoEventsError';
  }
}

export class UnsupportedVideoModeError extends DrpFormatError {
  constructor(public readonly videoMode: string) {
    super(`${i18n.t('Unsupported video mode')}: ${videoMode}`);
    this.name = 'UnsupportedVideoModeError';
  }
}

export class InvalidTimecodeError extends DrpFormatError {
  constructor(public readonly timecode: string, reason: string) {
    super(`${i18n.t('Invalid timecode')} ${timecode}: ${reason}`);
    this.name = 'InvalidTimecodeError';
  }
}

export class UnknownSourceError extends DrpFormatError {
  constructor(public readonly sourceIndex: number) {
    super(`${i18n.t('Unknown source index')}: ${sourceIndex}`);
    this.name = 'UnknownSourceError';
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}
