#!/usr/bin/env node
import React from 'react';
import { render } from 'ink';
import meow from 'meow';
import { applyOverrides, EngineConfig, loadConfig, parseHumanColor, toSearchConfig } from './core/config.js';
import { GoBoard } from './go/GoBoard.js';
import { GoSearch } from './go/GoSearch.js';
import { GtpEngine, serveGtp } from './gtp/GtpEngine.js';
import { COLOR_NAMES } from './go/types.js';
import GoGame from './ui/GoGame.js';

const cli = meow(`
	Usage
	  $ goban-mcts <mode>

	Modes
	  gtp     Speak the Go Text Protocol on stdin/stdout
	  play    Play against the engine in the terminal
	  debug   Print one generated move for an empty board

	Options
	  --size <n>               Board size: 9, 13 or 19
	  --komi <n>               Komi
	  --iterations <n>         Search iterations per move
	  --difficulty <level>     beginner (25), intermediate (200) or advanced (800)
	                           iterations, unless --iterations is given
	  --resign-threshold <n>   Score deficit that makes the engine resign
	  --color <b|w>            Your color in play mode (default: b)
	  --verbose                Log search summaries to stderr

	Environment
	  GO_ENGINE_BOARD_SIZE, GO_ENGINE_KOMI, GO_ENGINE_ITERATIONS,
	  GO_ENGINE_DIFFICULTY, GO_ENGINE_RESIGN_THRESHOLD, GO_ENGINE_VERBOSE

	Examples
	  $ goban-mcts gtp --size 9
	  $ goban-mcts play --size 9 --color w --iterations 400
	  $ goban-mcts play --size 13 --difficulty beginner
`, {
	importMeta: import.meta,
	flags: {
		size: {
			type: 'number',
		},
		komi: {
			type: 'number',
		},
		iterations: {
			type: 'number',
		},
		difficulty: {
			type: 'string',
		},
		resignThreshold: {
			type: 'number',
		},
		color: {
			type: 'string',
		},
		verbose: {
			type: 'boolean',
		},
	},
});

const resolveConfig = (): EngineConfig => {
	try {
		return applyOverrides(loadConfig(), {
			size: cli.flags.size,
			komi: cli.flags.komi,
			iterations: cli.flags.iterations,
			difficulty: cli.flags.difficulty,
			resignThreshold: cli.flags.resignThreshold,
			verbose: cli.flags.verbose,
		});
	} catch (err) {
		console.error(`[goban-mcts] ${err instanceof Error ? err.message : String(err)}`);
		process.exit(1);
	}
};

const runDebug = (config: EngineConfig) => {
	const board = new GoBoard(config.boardSize);
	board.setKomi(config.komi);
	const result = new GoSearch({ ...toSearchConfig(config), verbose: true }).search(board, 'b');
	console.log(board.render());
	console.log(`${COLOR_NAMES.b} to play: ${JSON.stringify(result.move)}`);
};

const runPlay = async (config: EngineConfig) => {
	const app = render(
		<GoGame
			size={config.boardSize}
			komi={config.komi}
			humanColor={parseHumanColor(cli.flags.color)}
			iterations={config.iterations}
			verbose={config.verbose}
			onExit={() => app.unmount()}
		/>
	);
	await app.waitUntilExit();
};

const main = async () => {
	const mode = (cli.input[0] ?? '').toLowerCase();
	const config = resolveConfig();

	switch (mode) {
		case 'gtp':
			await serveGtp(new GtpEngine({
				size: config.boardSize,
				komi: config.komi,
				search: toSearchConfig(config),
			}));
			break;
		case 'play':
			await runPlay(config);
			break;
		case 'debug':
			runDebug(config);
			break;
		default:
			console.error(`[goban-mcts] Invalid run mode "${mode}": must be gtp, play or debug`);
			cli.showHelp(1);
	}
};

main().catch(err => {
	console.error('[goban-mcts] Fatal error:', err);
	process.exit(1);
});
