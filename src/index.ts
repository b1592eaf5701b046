#!/usr/bin/env node
import { createCommand } from "./commands/create.js";

await createCommand.parseAsync();
