/**
 * Translations for status line labels and forecast messages
 */

import type { Config, Translations } from '../types.js';

const en: Translations = {
  labels: {
    '5h': '5h',
    '7d': '7d',
    '7d_sonnet': '7d-S',
  },
  time: {
    days: 'd',
    hours: 'h',
    minutes: 'm',
  },
  forecast: {
    soon: 'running out soon',
    soonWithReset: 'running out soon, resets in {reset}',
    pace: 'runs out {early} early',
    countdown: 'runs out in {depletion}',
    countdownWithWait: 'runs out in {depletion}, {early} before reset',
  },
};

const ko: Translations = {
  labels: {
    '5h': '5시간',
    '7d': '7일',
    '7d_sonnet': '7일-S',
  },
  time: {
    days: '일',
    hours: '시간',
    minutes: '분',
  },
  forecast: {
    soon: '곧 소진',
    soonWithReset: '곧 소진, {reset} 후 초기화',
    pace: '예정보다 {early} 일찍 소진',
    countdown: '{depletion} 후 소진',
    countdownWithWait: '{depletion} 후 소진, 초기화까지 {early} 남음',
  },
};

/**
 * Detect language from the environment locale
 */
export function detectLanguage(env: NodeJS.ProcessEnv = process.env): 'en' | 'ko' {
  const locale = env.LC_ALL || env.LC_MESSAGES || env.LANG || '';
  return locale.toLowerCase().startsWith('ko') ? 'ko' : 'en';
}

export function getTranslations(config: Pick<Config, 'language'>, env: NodeJS.ProcessEnv = process.env): Translations {
  const language = config.language === 'auto' ? detectLanguage(env) : config.language;
  return language === 'ko' ? ko : en;
}
