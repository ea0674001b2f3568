#!/usr/bin/env node
import { Command } from "commander";
import { VERSION } from "../version.js";
import { registerReconcileCli } from "./cli.js";

const program = new Command();
program.name("infragraph").description("Reconcile a declarative resource graph").version(VERSION);
registerReconcileCli({ program });

await program.parseAsync(process.argv);
