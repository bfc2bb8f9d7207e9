export * from './types';
export * from './errors';
export * from './interval';
export * from './date_math';
export * from './range_codec';
export * from './session_events';
export * from './refresh_scheduler';
export * from './time_range_state';
export * from './dashboard_settings';
export * from './address_bar';
export * from './session_coordinator';
