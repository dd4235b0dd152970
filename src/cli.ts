#!/usr/bin/env node
import {ZodError} from 'zod';
import {main} from './command';
import {FontError} from './errors';

main(process.argv.slice(2)).then(
	code => { process.exitCode = code; },
	(error: unknown) => {
		if (error instanceof FontError || error instanceof ZodError)
			console.error(error.message);
		else
			console.error(error);
		process.exitCode = 1;
	}
);
