/**
 * @fileoverview Detailed help text for workitem-hierarchy CLI commands
 */

const HELP_TEXT = {
  main: `
workitem-hierarchy - Extract GitLab epic and issue hierarchies into SQLite snapshots

USAGE:
    workitem-hierarchy <command> [options]

COMMANDS:
    extract             Extract the hierarchy below a root epic and store a snapshot
    stats               Show statistics for the latest snapshot
    cleanup             Remove old snapshots
    export              Export the latest snapshot as CSV or JSON
    query <sql>         Run a read-only SQL query against the snapshot store
    help [command]      Show help for a command

GLOBAL OPTIONS:
    -h, --help          Show help information
    -v, --version       Show version information
    -c, --config <file> Configuration file (default: ./hierarchy.config.yaml if present)
    --db <path>         SQLite database path (default: data/hierarchy.db)
    --verbose           Log at debug level

ENVIRONMENT:
    GITLAB_URL, GITLAB_TOKEN, HIERARCHY_DB, HIERARCHY_LOG_LEVEL, HIERARCHY_RATE_LIMIT_MS

EXAMPLES:
    workitem-hierarchy extract --group 42 --epic 7
    workitem-hierarchy extract --group 42 --epic 7 --scope 42,43,44
    workitem-hierarchy stats --root "epic:42#7"
    workitem-hierarchy export --format json --output out/hierarchy.json

For more information on a specific command, run:
    workitem-hierarchy help <command>
`,

  extract: `
workitem-hierarchy extract - Extract a hierarchy and store a snapshot

USAGE:
    workitem-hierarchy extract --group <id> --epic <iid> [options]

OPTIONS:
    -g, --group <id>        Group of the root epic
    -e, --epic <iid>        Root epic iid within the group
    --scope <ids>           Comma-separated groups to fetch all epics from up front;
                            parent links are then resolved in memory. The root's
                            group is added when missing.
    --gitlab-url <url>      GitLab instance (default: https://gitlab.com)
    --max-depth <n>         Deepest level to keep; the root is level 0 (default: 20)
    --exclude-closed        Drop closed issues (closed epics are always kept)
    --snapshot-date <date>  YYYY-MM-DD (default: today, UTC)
    --timeout <ms>          Abandon the build after this long; requests still
                            in flight are cancelled (default: no limit)
    --progress              Show a progress bar while storing
    --json                  Print the summary as JSON

DESCRIPTION:
    Requires a token in GITLAB_TOKEN or gitlab.token. Subtrees that fail to load
    are kept as childless and reported as conditions; only a missing root epic
    fails the command.

EXAMPLES:
    workitem-hierarchy extract --group 42 --epic 7
    workitem-hierarchy extract -g 42 -e 7 --scope 42,43 --max-depth 5 --progress
`,

  stats: `
workitem-hierarchy stats - Show statistics for the latest snapshot

USAGE:
    workitem-hierarchy stats [--root <id>] [--json]

OPTIONS:
    -r, --root <id>     Limit to one root, e.g. "epic:42#7"
    --json              Print the statistics as JSON
`,

  cleanup: `
workitem-hierarchy cleanup - Remove old snapshots

USAGE:
    workitem-hierarchy cleanup [--keep-days <n>]

OPTIONS:
    --keep-days <n>     Keep snapshots from the last n days (default: 90).
                        The latest snapshot of every item is always kept.
`,

  export: `
workitem-hierarchy export - Export the latest snapshot

USAGE:
    workitem-hierarchy export [--format csv|json] [--output <file>] [--root <id>]

OPTIONS:
    -f, --format <fmt>  csv (default) or json
    -o, --output <file> Write to a file instead of stdout
    -r, --root <id>     Limit to one root
`,

  query: `
workitem-hierarchy query - Run a read-only SQL query

USAGE:
    workitem-hierarchy query "<sql>" [--param <value>]... [--json]

OPTIONS:
    --sql <sql>         The statement, as an alternative to the positional form
    --param <value>     Value for the next ? placeholder (repeatable)
    --json              Print rows as JSON

EXAMPLES:
    workitem-hierarchy query "SELECT state, COUNT(*) AS n FROM work_item_hierarchy WHERE is_latest = 1 GROUP BY state"
    workitem-hierarchy query "SELECT title FROM work_item_hierarchy WHERE root_id = ?" --param "epic:42#7"
`,
};

type HelpTopic = keyof typeof HELP_TEXT;

function isHelpTopic(command: string): command is HelpTopic {
  return Object.prototype.hasOwnProperty.call(HELP_TEXT, command);
}

export function showHelp(command?: string): void {
  if (command && isHelpTopic(command)) {
    console.log(HELP_TEXT[command]);
  } else if (command) {
    console.log(`Unknown command: ${command}`);
    console.log(HELP_TEXT.main);
  } else {
    console.log(HELP_TEXT.main);
  }
}

export function getCommandHelp(command: string): string {
  return isHelpTopic(command) ? HELP_TEXT[command] : HELP_TEXT.main;
}
