import { decode } from './executor.js';

export function disassemble(word: number): string {
  const instruction = decode(word);
  if (!instruction) {
    return `.fill ${word}`;
  }
  const { opcode, regA, regB, destReg, offset } = instruction;
  switch (opcode) {
    case 'add':
    case 'nand':
      return `${opcode} ${regA} ${regB} ${destReg}`;
    case 'lw':
    case 'sw':
    case 'beq':
      return `${opcode} ${regA} ${regB} ${offset}`;
    case 'jalr':
      return `${opcode} ${regA} ${regB}`;
    case 'halt':
    case 'noop':
      return opcode;
  }
}
