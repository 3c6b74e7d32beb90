/**
 * Defaults for instrument configuration splitting.
 *
 * Every field listed in SERVER_FIELDS is extracted from each instrument entry
 * and filled with its default when absent. When adding a server-only field,
 * add it here with its default; the splitter reads nothing else.
 */

/**
 * Server-only fields and their defaults.
 */
export type ServerFieldDefaults = Readonly<Record<string, unknown>>;

export const SERVER_FIELDS: ServerFieldDefaults = Object.freeze({ initialize: true });

/**
 * Key of the GUI sub-document inside an instrument entry.
 */
export const GUI_FIELD = 'gui';

/**
 * Canonical GUI class path, used when no GUI is given or "generic" is requested.
 */
export const DEFAULT_GUI_TYPE = 'instrumentserver.gui.instruments.GenericInstrument';

/**
 * Alias for {@link DEFAULT_GUI_TYPE}, matched case-insensitively.
 */
export const GENERIC_GUI_ALIAS = 'generic';

/**
 * GUI descriptor of one instrument: the GUI class path plus whatever else the
 * entry carried (typically `kwargs`).
 */
export interface GuiDescriptor {
  type: string;
  [key: string]: unknown;
}

/**
 * Fresh default GUI descriptor (never shared between instruments).
 */
export function defaultGuiDescriptor(type: string = DEFAULT_GUI_TYPE): GuiDescriptor {
  return { type, kwargs: {} };
}
