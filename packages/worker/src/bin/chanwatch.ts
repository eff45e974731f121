#!/usr/bin/env node
import { runCli } from "../cli/index";

void runCli();
