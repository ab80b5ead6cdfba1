export function answer(): number {
  return 'forty-two';
}
