export {
  THEMES,
  DEFAULT_THEME,
  isThemeName,
  getTheme,
  listThemes,
} from './registry.js';
