export { initCommand } from './init.js';
export { runCommand } from './run.js';
export { ledgerCommand } from './ledger.js';
export { doctorCommand } from './doctor.js';
