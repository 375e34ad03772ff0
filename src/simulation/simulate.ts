// src/simulation/simulate.ts

import { createLogger } from '../utils/logger';
import { runRegistrationDay } from './runRegistrationDay';

runRegistrationDay(createLogger('info'))
    .then(summary => {
        process.exitCode = summary.invariantsHold ? 0 : 1;
    })
    .catch(err => {
        console.error('Simulation failed:', err);
        process.exitCode = 1;
    });
