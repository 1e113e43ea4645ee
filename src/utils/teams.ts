// Teams の会議 URL パターン
const TEAMS_URL_PATTERNS: readonly RegExp[] = [
  /https:\/\/teams\.microsoft\.com\/l\/meetup-join\/[^\s<>"']+/,
  /https:\/\/teams\.live\.com\/meet\/[^\s<>"']+/,
  /https:\/\/[a-zA-Z0-9-]+\.teams\.microsoft\.com\/[^\s<>"']+/,
];

// 本文に含まれる Teams 会議の目印（デンマーク語の招待文も含む）
const TEAMS_INDICATORS: readonly string[] = [
  'Microsoft Teams Meeting',
  'Teams Meeting',
  'Join Microsoft Teams Meeting',
  'Microsoft Teams-møde',
  'Teams-møde',
];

const ANY_HTTPS_URL = /https:\/\/[^\s<>"']+/g;

function trimTrailingPunctuation(url: string): string {
  return url.replace(/[.,:;!?]+$/, '');
}

function isUsableUrl(candidate: string): boolean {
  try {
    return new URL(candidate).host !== '';
  } catch {
    return false;
  }
}

/**
 * onlineMeeting が付いていない招待から Teams のリンクを探す
 * 目印だけ見つかって URL が無い場合は link が空文字になる
 */
export function extractTeamsLink(body: string, location: string): { link: string; isTeams: boolean } {
  const content = `${body} ${location}`;

  for (const pattern of TEAMS_URL_PATTERNS) {
    const match = content.match(pattern);
    if (match) {
      return { link: trimTrailingPunctuation(match[0]), isTeams: true };
    }
  }

  const lower = content.toLowerCase();
  const hasIndicator = TEAMS_INDICATORS.some(indicator => lower.includes(indicator.toLowerCase()));
  if (!hasIndicator) {
    return { link: '', isTeams: false };
  }

  for (const match of content.match(ANY_HTTPS_URL) ?? []) {
    const cleaned = trimTrailingPunctuation(match);
    if (isUsableUrl(cleaned)) {
      return { link: cleaned, isTeams: true };
    }
  }

  return { link: '', isTeams: true };
}
