/**
 * Accessibility helpers for live announcements.
 */

const LIVE_REGION_ID = 'a11y-live-region';

/**
 * Announce a message to screen readers using an ARIA live region
 */
export function announceToScreenReader(message: string, priority: 'polite' | 'assertive' = 'polite') {
  let liveRegion = document.getElementById(LIVE_REGION_ID);

  if (!liveRegion) {
    liveRegion = document.createElement('div');
    liveRegion.id = LIVE_REGION_ID;
    liveRegion.setAttribute('role', 'status');
    liveRegion.setAttribute('aria-atomic', 'true');
    liveRegion.className = 'sr-only';
    document.body.appendChild(liveRegion);
  }
  liveRegion.setAttribute('aria-live', priority);

  // Clearing first makes repeated identical messages audible
  const region = liveRegion;
  region.textContent = '';
  setTimeout(() => {
    region.textContent = message;
  }, 100);
}
