#!/usr/bin/env node
import { createCli } from "./cli/program";

void createCli().runExit(process.argv.slice(2));
