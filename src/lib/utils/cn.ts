import { clsx, type ClassValue } from 'clsx';
import { twMerge } from 'tailwind-merge';

/**
 * Conditional class names, with later Tailwind utilities overriding earlier ones
 */
export function cn(...inputs: ClassValue[]) {
  return twMerge(clsx(inputs));
}
