#!/usr/bin/env tsx
import { main } from './program';

await main(process.argv);
