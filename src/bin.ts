#!/usr/bin/env node
import { execute } from './cli';

void execute(process.argv);
