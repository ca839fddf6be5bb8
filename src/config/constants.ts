/**
 * Application name and version
 */
export const APP_NAME = "mpris-relay";
export const APP_VERSION = "1.0.0";

/**
 * D-Bus names
 */
export const MPRIS_PREFIX = "org.mpris.MediaPlayer2";
export const MPRIS_PATH = "/org/mpris/MediaPlayer2";
export const ROOT_INTERFACE = "org.mpris.MediaPlayer2";
export const PLAYER_INTERFACE = "org.mpris.MediaPlayer2.Player";
export const PROPERTIES_INTERFACE = "org.freedesktop.DBus.Properties";
export const INTROSPECTABLE_INTERFACE = "org.freedesktop.DBus.Introspectable";
export const PEER_INTERFACE = "org.freedesktop.DBus.Peer";

/**
 * Track id reported when nothing is loaded
 */
export const NO_TRACK_PATH = "/org/mpris/MediaPlayer2/TrackList/NoTrack";

/**
 * Error names sent back in D-Bus error replies
 */
export const DBUS_ERRORS = {
	UNKNOWN_PROPERTY: "org.freedesktop.DBus.Error.UnknownProperty",
	UNKNOWN_INTERFACE: "org.freedesktop.DBus.Error.UnknownInterface",
	PROPERTY_READ_ONLY: "org.freedesktop.DBus.Error.PropertyReadOnly",
	INVALID_ARGS: "org.freedesktop.DBus.Error.InvalidArgs",
	UNKNOWN_METHOD: "org.freedesktop.DBus.Error.UnknownMethod",
	FAILED: "org.freedesktop.DBus.Error.Failed",
} as const;

/**
 * Metadata placeholders for missing song fields
 */
export const METADATA_PLACEHOLDERS = {
	title: "Title Unknown",
	artist: "Artist Unknown",
	album: "Album Unknown",
} as const;

/**
 * Rating mapping
 */
export const LOVED_RATING = "love";
export const LOVED_USER_RATING = 5;

/**
 * Time units
 */
export const NANOS_PER_MICRO = 1000;
export const MICROS_PER_SECOND = 1_000_000;

/**
 * The only property a client may write
 */
export const WRITABLE_PROPERTIES: ReadonlySet<string> = new Set(["Volume"]);

/**
 * DOCTYPE line of every introspection document
 */
export const INTROSPECTION_DOCTYPE =
	'<!DOCTYPE node PUBLIC "-//freedesktop//DTD D-BUS Object Introspection 1.0//EN"\n "http://www.freedesktop.org/standards/dbus/1.0/introspect.dtd">';
