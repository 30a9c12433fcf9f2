import { setSilent } from "../src/lib/utils/log";

// Keep runner output clean.
setSilent(true);
