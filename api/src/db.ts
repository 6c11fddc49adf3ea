import { RosterEngine } from './roster/engine';

const engine = new RosterEngine();

export default engine;
