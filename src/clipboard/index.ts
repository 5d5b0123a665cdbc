/**
 * clipboard/index.ts
 *
 * Importing this file registers every clipboard backend.
 * Order matters: it is the auto-detection priority (Wayland before X11,
 * so XWayland sessions read through wl-paste).
 */

import './wayland';
import './x11';
