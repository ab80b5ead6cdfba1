export const VERSION = '1.0.0';

export interface Greeting {
  text: string;
}

function punctuate(text: string, excited: boolean): string {
  return excited ? `${text}!` : text;
}

export function greet(name: string, excited: boolean = false): string {
  return punctuate(`Hello, ${name}`, excited);
}

export function total(...values: number[]): number {
  return values.reduce((sum, v) => sum + v, 0);
}

export const double = (x: number): number => x * 2;

export function wrap(text: string): Greeting {
  return { text };
}

export function annotate(label: string, note: string | undefined): string {
  return note === undefined ? label : `${label} (${note})`;
}

export class Counter {
  count = 0;
}
