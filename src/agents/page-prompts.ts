/**
 * Prompt text and compatibility patches for page generation.
 *
 * Generated pages animate sections in with AOS. If the library never
 * initializes, every `[data-aos]` element stays at opacity 0 and the page
 * renders black; the patches below force visibility either way.
 */

import { formatRecordDump, isDegraded } from './record.js';
import type { StructuredRecord } from './types.js';

/** Present in any page whose reveal script ran (and in REVEAL_SCRIPT_PATCH). */
export const REVEAL_MARKER = 'aos-animate';

export const STYLE_PATCH_ATTR = 'data-compat-patch="reveal-style"';
export const SCRIPT_PATCH_ATTR = 'data-compat-patch="reveal-script"';

export const REVEAL_STYLE_PATCH = `<style ${STYLE_PATCH_ATTR}>
  /* AOS visibility fallback */
  [data-aos] {
    opacity: 1 !important;
    transform: none !important;
  }
  .aos-init [data-aos] {
    opacity: 0;
    transform: translateY(20px);
  }
  .aos-init .aos-animate {
    opacity: 1 !important;
    transform: none !important;
  }
</style>`;

export const REVEAL_SCRIPT_PATCH = `<script ${SCRIPT_PATCH_ATTR}>
  window.addEventListener('load', function () {
    if (typeof lucide !== 'undefined') lucide.createIcons();
    if (typeof AOS !== 'undefined') {
      AOS.init({ duration: 800, once: true, offset: 50 });
    }
    setTimeout(function () {
      document.querySelectorAll('[data-aos]').forEach(function (el) {
        el.classList.add('aos-animate');
      });
    }, 1000);
  });
</script>`;

const MANDATORY_CSS = `\`\`\`css
/* AOS Fallback - Prevent black screen */
[data-aos] {
    opacity: 1 !important;
    transform: none !important;
    transition: opacity 0.6s ease, transform 0.6s ease;
}
.aos-animate {
    pointer-events: auto;
}
/* Ensure visibility before JS loads */
body {
    opacity: 1;
}
\`\`\``;

const MANDATORY_SCRIPTS = `\`\`\`html
<script src="https://unpkg.com/aos@2.3.1/dist/aos.js"></script>
<script src="https://unpkg.com/lucide@latest/dist/umd/lucide.js"></script>
<script>
    window.addEventListener('load', function() {
        // Initialize Lucide icons
        if (typeof lucide !== 'undefined') {
            lucide.createIcons();
        }

        // Initialize AOS with safe settings
        if (typeof AOS !== 'undefined') {
            AOS.init({
                duration: 800,
                once: true,
                offset: 50,
                disable: 'mobile'
            });
        }

        // Fallback: ensure all elements visible after 1 second
        setTimeout(function() {
            document.querySelectorAll('[data-aos]').forEach(function(el) {
                el.classList.add('aos-animate');
            });
        }, 1000);
    });
</script>
\`\`\``;

const DESIGN_DIRECTIVES = `## TECHNICAL STACK:
- Tailwind CSS: <script src="https://cdn.tailwindcss.com"></script>
- AOS.js: <link href="https://unpkg.com/aos@2.3.1/dist/aos.css" rel="stylesheet">
- Lucide Icons: Use <i data-lucide="icon-name"></i>
- Google Fonts: Inter + Space Grotesk

## DESIGN: BENTO GRID

### Layout Structure:
\`\`\`html
<div class="grid grid-cols-12 gap-4 p-4">
    <!-- Hero: spans full width -->
    <div class="col-span-12">...</div>

    <!-- About: 8 cols, Skills: 4 cols -->
    <div class="col-span-12 md:col-span-8">...</div>
    <div class="col-span-12 md:col-span-4">...</div>

    <!-- Projects: varying spans (6, 4, 8, etc.) -->
    <div class="col-span-12 md:col-span-6">...</div>
    <div class="col-span-12 md:col-span-6">...</div>
</div>
\`\`\`

### Theme: PITCH BLACK + EMERALD
- Background: #000000 (pure black)
- Cards: bg-white/5 backdrop-blur-md border border-white/10 rounded-2xl
- Text: text-white, text-gray-400
- Accent: text-emerald-400, bg-emerald-500/10, border-emerald-500/30
- Hover: hover:bg-white/10 hover:border-emerald-500/50

### Card Style:
\`\`\`html
<div class="bg-white/5 backdrop-blur-md border border-white/10 rounded-2xl p-6
            hover:bg-white/10 hover:border-emerald-500/50 transition-all duration-300"
     data-aos="fade-up">
    <!-- content -->
</div>
\`\`\`

## SECTIONS:
1. **Hero**: Name (large), exact title from CV, tagline, social icons
2. **About**: Bio card (col-span-8)
3. **Skills**: Grouped skill tags (col-span-4)
4. **Projects**: Bento cards with EXACT project names, descriptions, tech stacks
5. **Experience**: Timeline with EXACT roles and dates
6. **Contact**: Footer with real links

## ABSOLUTE RULES:
1. Use ONLY the exact data provided - NO PLACEHOLDERS
2. NO <img> tags - Lucide icons only
3. Keep job titles EXACTLY as given (no promotions)
4. All links must be real URLs from the data
5. Include the AOS visibility fixes EXACTLY as shown above
6. Start with <!DOCTYPE html>, end with </html>`;

/** Data section: raw analysis for degraded records, the JSON dump otherwise. */
export function buildDataSection(record: StructuredRecord): string {
  if (isDegraded(record)) {
    return `## ANALYZED CV DATA:\n${record.raw_analysis}`;
  }
  return `## PORTFOLIO DATA (JSON):\n\`\`\`json\n${formatRecordDump(record)}\n\`\`\``;
}

export function buildGenerationPrompt(
  record: StructuredRecord,
  sourceText: string,
  previewChars = 2000,
): string {
  return `You are an elite frontend developer. Generate a COMPLETE, PRODUCTION-READY index.html portfolio.

${buildDataSection(record)}

## ORIGINAL CV TEXT (FOR VERIFICATION - USE EXACT DATA):
\`\`\`
${sourceText.slice(0, previewChars)}
\`\`\`

## CRITICAL: AOS VISIBILITY FIX
The page MUST NOT be black. Include these MANDATORY fixes:

### 1. CSS Fallback (in <style> tag):
${MANDATORY_CSS}

### 2. Proper Script Loading (at end of body):
${MANDATORY_SCRIPTS}

${DESIGN_DIRECTIVES}

Generate the COMPLETE HTML now.`;
}
