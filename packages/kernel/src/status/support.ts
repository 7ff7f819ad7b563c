/**
 * DDM Status Kernel — Support Actions
 *
 * Builds the contact links offered to the user from the configured support
 * details. Opening the links is left to whatever surface displays them.
 */

import type { Preferences } from '../types/preferences.js';

/** Deep link into the Software Update pane of System Settings. */
export const SOFTWARE_UPDATE_URL = 'x-apple.systempreferences:com.apple.preferences.softwareupdate';

export type SupportActionKind = 'phone' | 'email' | 'website';

export interface SupportAction {
  readonly kind: SupportActionKind;
  /** Human-readable label, e.g. "Call +41 21 000 00 00". */
  readonly label: string;
  /** URL to open: `tel:`, `mailto:` or the website as configured. */
  readonly target: string;
}

/**
 * Support actions in display order: phone, email, website.
 * Contacts left empty in the preferences produce no action.
 */
export function supportActions(preferences: Preferences): SupportAction[] {
  const actions: SupportAction[] = [];

  const phone = preferences.supportTeamPhone;
  if (phone !== '') {
    actions.push({
      kind: 'phone',
      label: `Call ${phone}`,
      target: `tel:${phone.replace(/ /g, '')}`,
    });
  }

  const email = preferences.supportTeamEmail;
  if (email !== '') {
    actions.push({ kind: 'email', label: 'Send email', target: `mailto:${email}` });
  }

  const website = preferences.supportTeamWebsite;
  if (website !== '') {
    actions.push({ kind: 'website', label: 'Open website', target: website });
  }

  return actions;
}
