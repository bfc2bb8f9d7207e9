// Time range commands
export * from './resolve_command';
export * from './url_command';

// Session commands
export * from './watch_command';

// Shared option parsing (not exposed as CLI commands)
export * from './cli_options';
