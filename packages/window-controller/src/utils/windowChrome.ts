import type { TabBarPlacement, ToolbarStyle, WindowConfig } from '@termshell/shared';

export interface WindowChrome {
  hasTitleBar: boolean;
  enhancedChrome: boolean;
  supportsToasts: boolean;
  supportsTabOverview: boolean;
  tabBarPlacement: TabBarPlacement;
  wideTabs: boolean;
  toolbarStyle: ToolbarStyle;
}

/**
 * Resolves the chrome a window is built with. Called once per window; the
 * result stays fixed for the window's lifetime even if the configuration is
 * reloaded.
 */
export function resolveWindowChrome(config: WindowConfig): WindowChrome {
  // The toolbar variant hangs off the title bar, so it needs one.
  const enhancedChrome = config.enhancedChrome && config.titleBar;

  // The toolbar variant only docks tab bars at the top or bottom.
  let tabBarPlacement = config.tabBarPlacement;
  if (enhancedChrome && (tabBarPlacement === 'left' || tabBarPlacement === 'right')) {
    tabBarPlacement = 'top';
  }

  return {
    hasTitleBar: config.titleBar,
    enhancedChrome,
    supportsToasts: enhancedChrome,
    supportsTabOverview: enhancedChrome,
    tabBarPlacement,
    wideTabs: config.wideTabs,
    toolbarStyle: config.toolbarStyle,
  };
}
