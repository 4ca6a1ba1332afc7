import { z } from 'zod';

export const TabBarPlacementSchema = z.enum(['top', 'left', 'right', 'bottom']);
export type TabBarPlacement = z.infer<typeof TabBarPlacementSchema>;

export const ToolbarStyleSchema = z.enum(['flat', 'raised', 'raised-border']);
export type ToolbarStyle = z.infer<typeof ToolbarStyleSchema>;

const WindowSizeSchema = z.object({
  width: z.number().int().min(1),
  height: z.number().int().min(1),
});

export type WindowSize = z.infer<typeof WindowSizeSchema>;

export const WindowConfigSchema = z.object({
  title: z.string().trim().min(1).default('Terminal'),
  defaultSize: WindowSizeSchema.default({ width: 1000, height: 600 }),
  /**
   * Create the title-bar region. Disabling it keeps the window manager's
   * decorations.
   */
  titleBar: z.boolean().default(true),
  /**
   * Whether the toolbar variant of the window (toasts, tab overview) may be
   * used. Only takes effect together with `titleBar`.
   */
  enhancedChrome: z.boolean().default(true),
  fullscreen: z.boolean().default(false),
  decorated: z.boolean().default(true),
  tabBarPlacement: TabBarPlacementSchema.default('top'),
  wideTabs: z.boolean().default(true),
  toolbarStyle: ToolbarStyleSchema.default('raised'),
});

export type WindowConfig = z.infer<typeof WindowConfigSchema>;
export type WindowConfigInput = z.input<typeof WindowConfigSchema>;

export function parseWindowConfig(value: unknown): WindowConfig {
  return WindowConfigSchema.parse(value ?? {});
}
