import { setLogLevel } from '../src/utils/log';

setLogLevel('silent');
