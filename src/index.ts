#!/usr/bin/env node
import pkg from '../package.json';

import { parse } from '@/parser';

await parse({ argv: process.argv, pkg })();
