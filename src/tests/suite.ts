/**
 * ============================================================
 *  gog-dosbox-setup — Test Suite
 * ============================================================
 *
 * `npm test` runs only what is imported here, grouped by pipeline stage.
 *
 * To add a new test file:
 *   1. Create your .test.ts file co-located with the module it tests.
 *   2. Add an import below in the correct stage section.
 * ============================================================
 */

// ─── Configuration ────────────────────────────────────────────────────────────
import "../modules/settings/settings.test.js";

// ─── Stage 1: Installer classification ────────────────────────────────────────
import "../modules/installer/game-name.test.js";
import "../modules/installer/classifier.test.js";

// ─── Stage 2: Extraction ──────────────────────────────────────────────────────
import "../modules/extractor/tools.test.js";
import "../modules/extractor/runner.test.js";
import "../modules/extractor/extract.test.js";
import "../modules/extractor/scratch.test.js";

// ─── Stage 3: Layout ──────────────────────────────────────────────────────────
import "../modules/layout/locator.test.js";

// ─── Stage 4: Config resolution and patches ───────────────────────────────────
import "../modules/dosbox-config/config-file.test.js";
import "../modules/dosbox-config/resolver.test.js";
import "../modules/dosbox-config/patches.test.js";

// ─── Stage 5: Materializer ────────────────────────────────────────────────────
import "../modules/materializer/templates.test.js";
import "../modules/materializer/copy.test.js";
import "../modules/materializer/configs.test.js";

// ─── Stage 6: Cleanup ─────────────────────────────────────────────────────────
import "../modules/cleanup/cleanup.test.js";

// ─── Stage 7: Report ──────────────────────────────────────────────────────────
import "../modules/report/size.test.js";

// ─── End to end ───────────────────────────────────────────────────────────────
import "../pipeline.test.js";
