import type { QueryDefinition, RenderOptions } from "./types";

/**
 * Queries run against the `acts(type, author)` table of the activity
 * snapshot. Report sections appear in this order.
 */
export const STATS_QUERIES: readonly QueryDefinition[] = Object.freeze([
  {
    name: "contributions-by-type",
    label: "The community has built a ton of things!",
    query: "select type, count(type) as num from acts group by type",
  },
  {
    name: "distinct-authors",
    label: "Looking at the community we have",
    query: "SELECT COUNT(DISTINCT author) as Users FROM acts",
  },
  {
    name: "community-authors",
    label:
      'Looking at the people that do not have "Acme" in their name (_but they still could be employees..._)',
    query:
      "SELECT COUNT(DISTINCT author) as 'Users' FROM acts WHERE author NOT LIKE '%Acme%' COLLATE NOCASE",
  },
  {
    name: "leaderboard",
    label: "The leaderboard:",
    query:
      "select author, count(author) as num from acts group by author order by num desc limit 5",
  },
  {
    name: "community-leaderboard",
    label:
      'If we remove the "Unknown" contributions and contributions from people that identify as "Acme Corp." the leaderboard is:',
    query:
      "select author, count(author) as num from acts where author not in ('Unknown','Your Name <you.name@example.org>') and author not like 'Acme Corp%' group by author order by num desc limit 5",
  },
]);

export const DEFAULT_RENDER_OPTIONS: Readonly<RenderOptions> = Object.freeze({
  mergeCells: true,
  rowSeparatorLine: true,
  renderAsTable: true,
});
