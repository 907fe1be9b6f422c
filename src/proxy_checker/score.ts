import { Anonymity, ProxyInfo } from '~/types';

export type ScoreInput = Pick<ProxyInfo, 'isAlive' | 'type' | 'anonymity' | 'latencyMs' | 'downloadSpeedKBps'>;

export const MAX_SCORE = 100;

const ANONYMITY_POINTS: Record<Anonymity, number> = {
    Elite: 40,
    Anonymous: 20,
    Transparent: 0,
    Unknown: 0,
};

/**
 * 0 - 100. A dead proxy always scores 0.
 */
export function calculateScore(info: ScoreInput): number {
    if (!info.isAlive) return 0;

    let score = ANONYMITY_POINTS[info.anonymity];

    if (info.latencyMs > 0 && info.latencyMs < 1000) {
        score += Math.round(20 * (1 - info.latencyMs / 1000));
    }

    if (info.downloadSpeedKBps > 0) {
        score += Math.round(20 * (1 - Math.exp(-info.downloadSpeedKBps / 1000)));
    }

    if (info.type === 'HTTPS' || info.type === 'SOCKS5') {
        score += 20;
    }

    return Math.min(MAX_SCORE, score);
}
