import { apiRequest } from './api.js';
import { decodeAppTimestamp, decodePageSettings, type PageSettings } from './schemas.js';
import { buildHeaders } from './session.js';
import type { NemligSession } from './types.js';
import { ENDPOINTS } from './types.js';

/**
 * Timeslot sent when the front page JSON carries none.
 */
export const DEFAULT_TIMESLOT_UTC = '2025120216-180-1020';

/**
 * Get the website app settings (raw JSON).
 *
 * Carries `CombinedProductsAndSitecoreTimestamp`, which search requests echo back.
 */
export async function getAppSettings(session: NemligSession): Promise<unknown> {
  return apiRequest(session, ENDPOINTS.appSettings, {
    headers: buildHeaders(session),
  });
}

/**
 * Get the settings every search call must carry.
 *
 * Two chained requests: app settings for the catalogue timestamp, then the
 * front page rendered as JSON for the delivery timeslot, zone and user id.
 * These are server-side session parameters and are fetched fresh on each call.
 *
 * @example
 * const settings = await getPageSettings(session);
 * console.log(settings.timeslotUtc); // "2025120216-180-1020"
 */
export async function getPageSettings(session: NemligSession): Promise<PageSettings> {
  const appSettings = await getAppSettings(session);

  const page = await apiRequest(session, ENDPOINTS.home, {
    headers: buildHeaders(session),
    params: { GetAsJson: '1', d: '1' },
  });
  const settings = decodePageSettings(page);

  return {
    timestamp: decodeAppTimestamp(appSettings),
    timeslotUtc: settings.timeslotUtc || DEFAULT_TIMESLOT_UTC,
    deliveryZoneId: settings.deliveryZoneId,
    userId: settings.userId,
  };
}
