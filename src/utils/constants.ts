/**
 * Centralized constants for kdotool
 */

// === Marker / Temp Files ===
/** Prefix of the per-invocation temp directory (its basename is the marker) */
export const TEMP_DIR_PREFIX = 'kdotool-';
/** File name of the generated script inside the temp directory */
export const SCRIPT_FILE_NAME = 'script.js';

// === KWin ===
/** Prefix KWin puts in front of print() output in its log */
export const KWIN_LOG_PREFIX = 'js: ';
/** D-Bus service name of the compositor */
export const KWIN_DBUS_SERVICE = 'org.kde.KWin';
/** Object path of the scripting manager */
export const KWIN_SCRIPTING_PATH = '/Scripting';
/** Interface exposing loadScript() */
export const KWIN_SCRIPTING_INTERFACE = 'org.kde.kwin.Scripting';
/** Interface exposing run()/stop() on a loaded script */
export const KWIN_SCRIPT_INTERFACE = 'org.kde.kwin.Script';
/** systemd user units KWin logs under */
export const KWIN_JOURNAL_UNITS = [
  'plasma-kwin_wayland.service',
  'plasma-kwin_x11.service',
] as const;

// === Time Constants ===
/** Milliseconds per second */
export const MS_PER_SECOND = 1000;

// === Default Configuration ===
/** Default timeout for each D-Bus call in ms */
export const DEFAULT_DBUS_TIMEOUT_MS = 5000;
/** Default directory for --log files */
export const DEFAULT_LOG_DIR = 'logs';
