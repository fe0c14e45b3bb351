import { registerAkbank } from './akbank/register.js';
import { registerGaranti } from './garanti/register.js';
import { registerHalkbank } from './halkbank/register.js';
import { registerIsbank } from './isbank/register.js';
import { registerQnb } from './qnb/register.js';
import { registerVakifbank } from './vakifbank/register.js';
import { registerYkb } from './ykb/register.js';
import { registerZiraat } from './ziraat/register.js';

export function registerAllBanks(): void {
  registerAkbank();
  registerGaranti();
  registerHalkbank();
  registerIsbank();
  registerQnb();
  registerVakifbank();
  registerYkb();
  registerZiraat();
}
