#!/usr/bin/env node
import { main } from "../cli/inspect.js";

await main();
