import { z } from 'zod';

export const BINDING_ACTION_IDS = [
  'new_tab',
  'new_window',
  'close_surface',
  'split_right',
  'split_down',
  'toggle_inspector',
  'copy_to_clipboard',
  'paste_from_clipboard',
  'reset',
] as const;

export const BindingActionIdSchema = z.enum(BINDING_ACTION_IDS);
export type BindingActionId = z.infer<typeof BindingActionIdSchema>;

/**
 * Actions a window answers itself rather than forwarding to a surface.
 */
export const WINDOW_LOCAL_ACTION_IDS = ['about'] as const;

export const WindowActionIdSchema = z.enum([...BINDING_ACTION_IDS, ...WINDOW_LOCAL_ACTION_IDS]);
export type WindowActionId = z.infer<typeof WindowActionIdSchema>;

export const SplitDirectionSchema = z.enum(['right', 'down']);
export type SplitDirection = z.infer<typeof SplitDirectionSchema>;

export const BindingActionSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('new_tab') }),
  z.object({ type: z.literal('new_window') }),
  z.object({ type: z.literal('close_surface') }),
  z.object({ type: z.literal('new_split'), direction: SplitDirectionSchema }),
  z.object({ type: z.literal('inspector'), mode: z.literal('toggle') }),
  z.object({ type: z.literal('copy_to_clipboard') }),
  z.object({ type: z.literal('paste_from_clipboard') }),
  z.object({ type: z.literal('reset') }),
]);

export type BindingAction = z.infer<typeof BindingActionSchema>;

export function toBindingAction(actionId: BindingActionId): BindingAction {
  switch (actionId) {
    case 'new_tab':
      return { type: 'new_tab' };
    case 'new_window':
      return { type: 'new_window' };
    case 'close_surface':
      return { type: 'close_surface' };
    case 'split_right':
      return { type: 'new_split', direction: 'right' };
    case 'split_down':
      return { type: 'new_split', direction: 'down' };
    case 'toggle_inspector':
      return { type: 'inspector', mode: 'toggle' };
    case 'copy_to_clipboard':
      return { type: 'copy_to_clipboard' };
    case 'paste_from_clipboard':
      return { type: 'paste_from_clipboard' };
    case 'reset':
      return { type: 'reset' };
  }
}

export function parseWindowActionId(value: unknown): WindowActionId | null {
  const result = WindowActionIdSchema.safeParse(typeof value === 'string' ? value.trim() : value);
  return result.success ? result.data : null;
}
