/**
 * dialog/index.ts
 *
 * Importing this file registers every dialog backend. kdialog only claims
 * KDE sessions, so it goes first; zenity takes any other graphical session.
 */

import './kdialog';
import './zenity';
