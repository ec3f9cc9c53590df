import { parseArgs } from "util";

export const USAGE = `Usage: matrix-archive [options]

Options:
  -u, --user <id>         Matrix user to log in as (@user:server)
  -p, --password <pw>     Password for logging in
      --host <url>        Matrix homeserver (default: https://matrix.org)
      --db <name>         Database to archive into (default: matrixArchive)
      --room <id>         Room to archive; repeat for several rooms, in sequence
      --exclude <id>      Room to skip; repeatable
      --log-level <lvl>   silent|error|warn|info|debug
  -h, --help              Show this help
`;

export interface CliOptions {
	help: boolean;
	/** Flag values under the environment variable names they override. */
	env: Record<string, string>;
}

/**
 * Command-line flags, which take precedence over the environment. They are
 * returned as variables so settings derived from them (the auth database
 * from --db, say) follow along in loadConfig.
 */
export function parseCliArgs(argv: string[]): CliOptions {
	const { values } = parseArgs({
		args: argv,
		options: {
			user: { type: "string", short: "u" },
			password: { type: "string", short: "p" },
			host: { type: "string" },
			db: { type: "string" },
			room: { type: "string", multiple: true },
			exclude: { type: "string", multiple: true },
			"log-level": { type: "string" },
			help: { type: "boolean", short: "h" }
		},
		strict: true,
		allowPositionals: false
	});

	const env: Record<string, string> = {};
	if (values.user) env.MATRIX_USER = values.user;
	if (values.password) env.MATRIX_PASSWORD = values.password;
	if (values.host) env.MATRIX_HOST = values.host;
	if (values.db) env.DB_NAME = values.db;
	if (values.room && values.room.length > 0) env.MATRIX_ROOM_IDS = values.room.join(",");
	if (values.exclude && values.exclude.length > 0) env.EXCLUDED_MATRIX_ROOM_IDS = values.exclude.join(",");
	if (values["log-level"]) env.LOG_LEVEL = values["log-level"];
	return { help: values.help === true, env };
}
