export const palette = {
  pending: '#6366F1',
  done: '#9CA3AF',
  background: '#F9FAFB',
  foreground: '#111827'
} as const;

type Palette = typeof palette;
export type PaletteKey = keyof Palette;
