export const INSTRUCTIONS = `
# Readwise Vault Import

You can import the user's Readwise library into their notes vault:

- **Import new items:** \`readwise_import_recent\` (Reader documents), \`readwise_import_recent_highlights\`
- **Import older items:** \`readwise_backfill\`, \`readwise_backfill_highlights\` (walk back to a date)
- **Inspect / repair state:** \`readwise_state_info\`, \`readwise_init_ranges\`, \`readwise_reset_state\`
- **Look up highlights:** \`readwise_daily_review\`, \`readwise_book_highlights\`, \`readwise_search_highlights\`

Imports never overwrite notes. Items already in the vault (matched by their
Readwise ID) are skipped, so every import tool is safe to run again.

## Typical workflow

- Start with \`readwise_state_info\` to see when the last import ran and which
  date ranges are already synced.
- Use \`readwise_import_recent\` for new documents. Repeat it while it keeps
  importing items; it only fetches what changed since the previous run.
- Use \`readwise_backfill\` with a \`target_date\` (YYYY-MM-DD) to fill in older
  history. If the date is inside a synced range it returns \`already_synced\`
  without calling the API.
- \`page_limit_reached\` means the backfill stopped at its page limit before the
  target date. Every backfill starts from the newest item, so running it again
  stops at the same place. Tell the user to raise \`maxBackfillPages\` (or
  \`maxHighlightPages\`) in the config file, or pick a more recent target date.

## When state looks wrong

- If \`backfill_in_progress\` is true, the last backfill was interrupted. The next
  backfill re-walks from the newest item; already imported items are skipped.
- If notes were deleted or moved by hand, synced ranges may claim more than the
  vault holds. Run \`readwise_init_ranges\` to rebuild them from the files on disk,
  or \`readwise_reset_state\` with \`clear_ranges: true\` to start over.
- Reports with \`failed > 0\` list the items that could not be saved. The import
  timestamp does not advance past them, so the next run retries them.
`;
