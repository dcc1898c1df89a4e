// Help text for `phab-stack help`

const HELP_LINES = [
  "🔧 phab-stack - Submit commit stacks to Phabricator",
  "━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━",
  "",
  "USAGE:",
  "  phab-stack [COMMAND] [OPTIONS]",
  "",
  "COMMANDS:",
  "  submit [start] [end]    Submit the commits from start to end as a stack of revisions",
  "    -y, --yes             Submit without asking for confirmation",
  "    -f, --force           Update every revision and submit despite failed checks",
  "    --dry-run             Show what would be done without making changes",
  "    -s, --single          Submit a single commit (start, or end, or HEAD)",
  "    --wip / --no-wip      Submit as changes-planned / force review",
  "    -r, --reviewer NICK   Set reviewers, a trailing ! makes one blocking",
  "    -R, --blocker NICK    Set blocking reviewers",
  "    -b, --bug ID          Set the bug ID of every commit",
  "    --no-bug              Submit without a bug ID",
  "    -m, --message TEXT    Comment to add to updated revisions",
  "    --less-context        Send 100 lines of context instead of whole files",
  "    -u, --upstream REMOTE Remote whose branches count as published",
  "    --allow-reorder       Rewrite parents of a reordered stack",
  "    -p, --path DIR        Repository to work in (default: current directory)",
  "",
  "  auth test               Test Conduit authentication",
  "  auth help               Show authentication help",
  "",
  "  help, --help, -h        Show this help message",
  "",
  "EXAMPLES:",
  "  phab-stack submit                   # Submit every unpublished commit",
  "  phab-stack submit --dry-run         # Preview what would be done",
  "  phab-stack submit -s -r alice HEAD  # Submit HEAD alone for alice to review",
];

export function helpText(): string {
  return HELP_LINES.join("\n");
}
