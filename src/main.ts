/**
 * CLI entrypoint: one scrape run
 *
 * Usage:
 *   npm start
 *
 * Environment variables (all optional, see .env.example):
 *   - GOOGLE_OAUTH_KEYS_FILE / GOOGLE_OAUTH_TOKEN_FILE: OAuth files
 *   - PAGES_PER_QUERY, EXPERIENCE_LEVELS: search tuning
 *   - SEARCH_PAGE_DELAY_MS, DETAIL_DELAY_MS, HTTP_TIMEOUT_MS: pacing
 *   - SKILLS_PATH: skill vocabulary JSON
 *   - LOG_LEVEL: Logging level (debug, info, warn, error)
 */

import "dotenv/config";
import { runCli } from "./orchestration";

runCli(process.env).then((code) => process.exit(code));
