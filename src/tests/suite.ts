/**
 * ============================================================
 *  Wine Compatibility Launcher — Test Suite
 * ============================================================
 *
 * This file is the single source of truth for all tests.
 * Every test file MUST be imported here to be included in the suite.
 * Tests are grouped by module, leaves first.
 *
 * Run:            npm test
 *
 * To add a new test file:
 *   1. Create your .test.ts file co-located with the module it tests.
 *   2. Add an import below in the matching section.
 *   3. That's it — the test runner picks it up automatically.
 * ============================================================
 */

// ─── Launcher paths & settings ────────────────────────────────────────────────
import "../backend/modules/paths/paths.test.js";
import "../backend/modules/settings/settings.test.js";

// ─── Components: features & registry ──────────────────────────────────────────
import "../backend/modules/components/features.test.js";
import "../backend/modules/components/registry.test.js";

// ─── Steam runtime discovery ──────────────────────────────────────────────────
import "../backend/modules/steam/environment.test.js";
import "../backend/modules/steam/library-folders.test.js";
import "../backend/modules/steam/discovery.test.js";

// ─── Launch readiness ─────────────────────────────────────────────────────────
import "../backend/modules/readiness/patch-sync.test.js";
import "../backend/modules/readiness/patches.test.js";
import "../backend/modules/readiness/resolver.test.js";

// ─── Games: context assembly & launch plan ────────────────────────────────────
import "../backend/modules/games/profiles.test.js";
import "../backend/modules/games/context.test.js";
import "../backend/modules/games/launch-plan.test.js";
