export { orGate } from './or.ts';
export { andGate } from './and.ts';
export { nandGate } from './nand.ts';
export { norGate } from './nor.ts';
export { notGate } from './not.ts';
export { and3Gate } from './and-3.ts';
export { nand3Gate } from './nand-3.ts';
export { nor3Gate } from './nor-3.ts';
