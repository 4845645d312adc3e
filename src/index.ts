#!/usr/bin/env node
import { createGenerateCommand } from "./commands/generate.js";

const program = createGenerateCommand().version("0.1.0");

await program.parseAsync();
