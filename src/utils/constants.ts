/**
 * Attribute keys for dashboard session context in OpenTelemetry logs and metrics.
 */
export const ATTR_DASHBOARD_UID = 'dashboard.uid';
export const ATTR_DASHBOARD_TITLE = 'dashboard.title';

// Experimental resource attribute, not exported by the stable semantic-conventions entry point
export const ATTR_DEPLOYMENT_ENVIRONMENT = 'deployment.environment';

/**
 * Event names on the session notification channel.
 */
export const EVENT_TIME_RANGE_CHANGED = 'time-range-changed';
export const EVENT_REFRESH_REQUESTED = 'refresh-requested';

/**
 * Reasons attached to refresh requests.
 */
export const REFRESH_REASON_RANGE_CHANGED = 'range-changed';
export const REFRESH_REASON_INTERVAL = 'interval';
export const REFRESH_REASON_MANUAL = 'manual';

/**
 * Scheduler states.
 */
export const SCHEDULER_STATE_IDLE = 'idle';
export const SCHEDULER_STATE_ARMED = 'armed';

/**
 * Address-bar query parameter names.
 */
export const PARAM_FROM = 'from';
export const PARAM_TO = 'to';

/**
 * Longest delay a single setTimeout honors; Node runs anything above it after 1 ms.
 */
export const MAX_TIMER_DELAY_MS = 2_147_483_647;
