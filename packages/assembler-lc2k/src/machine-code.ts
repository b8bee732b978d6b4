// アセンブラ出力 (.mc): 10 進数の機械語を 1 行 1 ワードで並べる。
export function formatMachineCode(words: readonly number[]): string {
  if (words.length === 0) {
    return '';
  }
  return `${words.map((word) => String(word | 0)).join('\n')}\n`;
}
