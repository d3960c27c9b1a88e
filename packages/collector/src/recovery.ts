/**
 * Startup recovery of reconciliation counters from the time-series store.
 *
 * Agreement and miss counters always resume from their stored values. The
 * raw validations counter resumes only if the validator node itself did not
 * restart in the meantime, judged from its reported uptime now versus five
 * minutes ago.
 */

import {
  createLogger,
  firstRangeValue,
  firstValue,
  type Logger,
  type MetricsReader,
} from '@validator-watch/shared';
import type { RecoveredCounters, WindowCounts } from './reconciliation.js';

export interface RecoveredState extends RecoveredCounters {
  /** null when either uptime sample was unavailable */
  upstreamRestarted: boolean | null;
}

export const UPTIME_LOOKBACK_SEC = 300;
export const UPTIME_TOLERANCE_SEC = 120;

/**
 * True when the current uptime is lower than the past sample by more than
 * the tolerance. Null when either sample is missing.
 */
export function detectUpstreamRestart(
  pastUptimeSec: number | null,
  currentUptimeSec: number | null,
  toleranceSec = UPTIME_TOLERANCE_SEC
): boolean | null {
  if (pastUptimeSec === null || currentUptimeSec === null) return null;
  return currentUptimeSec < pastUptimeSec - toleranceSec;
}

function windowCounts(agreements: number | null, missed: number | null): WindowCounts | null {
  if (agreements === null && missed === null) return null;
  return { agreements: agreements ?? 0, missed: missed ?? 0 };
}

export async function recoverState(
  reader: MetricsReader,
  nowSec: number,
  logger: Logger = createLogger('recovery')
): Promise<RecoveredState> {
  const instant = async (promql: string) => firstValue(await reader.query(promql));

  const [agreementsTotal, missedTotal, validationsChecked, agreements1h, missed1h, agreements24h, missed24h, past, current] =
    await Promise.all([
      instant('max_over_time(xrpl_validation_agreements_total[24h])'),
      instant('max_over_time(xrpl_validation_missed_total[24h])'),
      instant('max_over_time(xrpl_validations_checked_total[24h])'),
      instant('last_over_time(xrpl_validation_agreements_1h[5m])'),
      instant('last_over_time(xrpl_validation_missed_1h[5m])'),
      instant('last_over_time(xrpl_validation_agreements_24h[5m])'),
      instant('last_over_time(xrpl_validation_missed_24h[5m])'),
      reader
        .queryRange('xrpl_validator_uptime_seconds', nowSec - UPTIME_LOOKBACK_SEC, nowSec, 60)
        .then(firstRangeValue),
      instant('xrpl_validator_uptime_seconds'),
    ]);

  const upstreamRestarted = detectUpstreamRestart(past, current);
  let validationsSent: number | null;
  if (upstreamRestarted === true) {
    logger.info(`🔄 Validator restarted (uptime ${past}s -> ${current}s), validations counter starts from 0`);
    validationsSent = 0;
  } else {
    validationsSent = await instant('max_over_time(xrpl_validations_total[24h])');
  }

  const state: RecoveredState = {
    agreementsTotal,
    missedTotal,
    validationsChecked,
    validationsSent,
    window1h: windowCounts(agreements1h, missed1h),
    window24h: windowCounts(agreements24h, missed24h),
    upstreamRestarted,
  };

  logger.info(
    `Recovered counters: agreements=${agreementsTotal ?? 'n/a'} missed=${missedTotal ?? 'n/a'} ` +
      `validations=${validationsSent ?? 'n/a'} 1h=${state.window1h ? `${state.window1h.agreements}/${state.window1h.missed}` : 'n/a'}`
  );
  return state;
}
