/**
 * Members of every interface exported at the MPRIS object path
 */

import {
	INTROSPECTABLE_INTERFACE,
	PLAYER_INTERFACE,
	PROPERTIES_INTERFACE,
	ROOT_INTERFACE,
} from "../config/constants";
import type { InterfaceDescription } from "../interfaces";

export const INTROSPECTABLE_DESCRIPTION: InterfaceDescription = {
	name: INTROSPECTABLE_INTERFACE,
	methods: [
		{ name: "Introspect", args: [{ name: "xml_data", type: "s", direction: "out" }] },
	],
	signals: [],
};

export const PROPERTIES_DESCRIPTION: InterfaceDescription = {
	name: PROPERTIES_INTERFACE,
	methods: [
		{
			name: "Get",
			args: [
				{ name: "interface_name", type: "s", direction: "in" },
				{ name: "property_name", type: "s", direction: "in" },
				{ name: "value", type: "v", direction: "out" },
			],
		},
		{
			name: "Set",
			args: [
				{ name: "interface_name", type: "s", direction: "in" },
				{ name: "property_name", type: "s", direction: "in" },
				{ name: "new_value", type: "v", direction: "in" },
			],
		},
		{
			name: "GetAll",
			args: [
				{ name: "interface_name", type: "s", direction: "in" },
				{ name: "properties", type: "a{sv}", direction: "out" },
			],
		},
	],
	signals: [
		{
			name: "PropertiesChanged",
			args: [
				{ name: "interface_name", type: "s" },
				{ name: "changed_properties", type: "a{sv}" },
				{ name: "invalidated_properties", type: "as" },
			],
		},
	],
};

export const ROOT_DESCRIPTION: InterfaceDescription = {
	name: ROOT_INTERFACE,
	methods: [
		{ name: "Raise", args: [] },
		{ name: "Quit", args: [] },
	],
	signals: [],
};

export const PLAYER_DESCRIPTION: InterfaceDescription = {
	name: PLAYER_INTERFACE,
	methods: [
		{ name: "Next", args: [] },
		{ name: "Previous", args: [] },
		{ name: "Pause", args: [] },
		{ name: "PlayPause", args: [] },
		{ name: "Stop", args: [] },
		{ name: "Play", args: [] },
		{
			name: "SetPosition",
			args: [
				{ name: "TrackId", type: "o", direction: "in" },
				{ name: "Position", type: "x", direction: "in" },
			],
		},
	],
	signals: [{ name: "Seeked", args: [{ name: "Position", type: "x" }] }],
};

export const MPRIS_OBJECT_INTERFACES: readonly InterfaceDescription[] = [
	INTROSPECTABLE_DESCRIPTION,
	PROPERTIES_DESCRIPTION,
	ROOT_DESCRIPTION,
	PLAYER_DESCRIPTION,
];
