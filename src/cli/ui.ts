import { readFileSync } from "fs";
import color from "picocolors";
import config from "../config.js";
import type { DeviceReport, RoomReport, RunReport } from "../types/archive.js";

const ANSI_RE = /\x1B\[[0-9;]*m/g;
function hasVisibleDiamond(s: string): boolean {
	const visible = String(s || "").replace(ANSI_RE, "");
	return /^\s*◇/.test(visible);
}
function stripVisibleDiamond(s: string): string {
	const visible = String(s || "").replace(ANSI_RE, "");
	return visible.replace(/^\s*◇\s*/, "");
}

// Read version from package.json
function readVersion(): string {
	try {
		const pkg: unknown = JSON.parse(readFileSync(new URL("../../package.json", import.meta.url), "utf8"));
		if (pkg && typeof pkg === "object" && "version" in pkg && typeof pkg.version === "string") {
			return pkg.version;
		}
	} catch {
		return "0.0.0";
	}
	return "0.0.0";
}
const version = readVersion();

// Log level gating
const LEVELS = { silent: 0, error: 10, warn: 20, info: 30, debug: 40 } as const;
export type Level = keyof typeof LEVELS;

export function isLevel(value: string): value is Level {
	return Object.prototype.hasOwnProperty.call(LEVELS, value);
}

let currentLevel: Level = isLevel(config.logLevel) ? config.logLevel : "info";

export function setLogLevel(level: string): void {
	if (!isLevel(level)) throw new Error(`Unknown log level "${level}" (silent|error|warn|info|debug)`);
	currentLevel = level;
}

function isEnabled(level: Level): boolean {
	return LEVELS[level] <= LEVELS[currentLevel];
}

const line = (mark: string, text: string) => {
	const body = hasVisibleDiamond(text) ? stripVisibleDiamond(text) : text;
	console.log(mark + "  " + body);
};

export const print = (text: string) => {
	if (!isEnabled("info")) return;
	line(color.green("◇"), text);
};

export const printLog = (text: string) => {
	if (!isEnabled("debug")) return;
	line(color.blue("◇"), text);
};

export const printError = (text: string) => {
	if (!isEnabled("error")) return;
	line(color.red("◇"), text);
};

export const printWarning = (text: string) => {
	if (!isEnabled("warn")) return;
	line(color.yellow("◇"), text);
};

export const printIntro = () => {
	if (!isEnabled("info")) return;
	console.log("");
	console.log(color.bgCyan(color.white(` Matrix Room Archiver v${version} `)));
	console.log("|----------------------------------------------------------------------------|");
	console.log("|   Mirrors Matrix rooms, members, devices and attachments into MongoDB.     |");
	console.log("|----------------------------------------------------------------------------|");
};

export const printLoading = (userId: string, homeserver: string) => {
	print(`Signing into ${homeserver} as ${userId}...`);
};

export const printDevices = (report: DeviceReport) => {
	if (report.error) {
		printError(`Device list not archived: ${report.error}`);
		return;
	}
	print(`Devices: ${report.inserted} new, ${report.present} already archived.`);
};

export const printRoomSummary = (report: RoomReport) => {
	const label = `'${report.displayName}' (Room ID: ${report.roomId})`;
	switch (report.status) {
		case "skipped":
			print(`Skipped room ${label}: on the excluded list.`);
			return;
		case "failed":
			printError(`Room ${label} failed: ${report.error}`);
			if (report.newEvents > 0) {
				printWarning(` | ${report.newEvents} events committed before the failure are kept.`);
			}
			return;
		case "archived": {
			const a = report.attachments;
			print(
				` | ${label}: ${report.newEvents} new events, ${report.newMembers} new members, ` +
					`attachments ${a.fetched} fetched / ${a.failed} failed / ${a.rejected} rejected / ${a.alreadyCached} cached`
			);
		}
	}
};

export const printOutro = (report: RunReport) => {
	if (!isEnabled("info")) return;
	const total = report.rooms.reduce((sum, r) => sum + r.newEvents, 0);
	const failed = report.rooms.filter((r) => r.status === "failed").length;
	const status = failed > 0 ? color.yellow(`${failed} room(s) failed`) : color.green("all rooms archived");
	console.log(color.green("◇") + "  " + `Done with archiving run: ${total} new events across ${report.rooms.length} rooms, ${status}.`);
};
