import React, { useState, useEffect, useCallback } from 'react';
import { Box, Text, useInput } from 'ink';
import { GoProtocol, GoState } from '../core/GoProtocol.js';
import { indexToColumn } from '../go/GoCoordinates.js';
import { formatScore } from '../go/GoScoring.js';
import { BoardSize, COLOR_NAMES, COLUMNS, Color, Intersection, STONE_GLYPHS, EMPTY_GLYPH, oppositeColor } from '../go/types.js';

/**
 * Props for GoGame component
 */
export interface GoGameProps {
	onExit: () => void;
	size?: BoardSize;
	komi?: number;
	humanColor?: Color;
	iterations?: number;
	verbose?: boolean;
}

/**
 * Terminal Go board: the human moves a cursor and places stones, the engine
 * answers with a Monte Carlo search.
 */
const GoGame = ({
	onExit,
	size = 9,
	komi,
	humanColor = 'b',
	iterations = 200,
	verbose = false,
}: GoGameProps) => {
	const [game] = useState(() => new GoProtocol({ size, komi, search: { iterations, verbose } }));
	const [state, setState] = useState<GoState>(() => game.getState());
	// 0-based column, 1-based row counted from the bottom
	const [cursor, setCursor] = useState({ col: Math.floor(size / 2), row: Math.ceil(size / 2) });
	const [message, setMessage] = useState<string | null>(null);
	const [thinking, setThinking] = useState(false);

	useEffect(() => {
		return game.onStateChange(next => setState(next));
	}, []);

	const engineColor = oppositeColor(humanColor);
	const gameOver = state.winner !== null;
	const isHumanTurn = !gameOver && state.toMove === humanColor;

	const engineMove = useCallback(async () => {
		setThinking(true);
		try {
			const suggestion = await game.getAISuggestion({ iterations });
			const result = game.applyAction(suggestion.action);
			if (!result.valid) {
				setMessage(`Engine move rejected: ${result.error ?? 'unknown'}`);
			} else if (suggestion.action.type === 'place') {
				setMessage(`${COLOR_NAMES[engineColor]} played ${suggestion.action.payload.column}${suggestion.action.payload.row}`);
			} else {
				setMessage(`${COLOR_NAMES[engineColor]} chose to ${suggestion.action.type}`);
			}
		} catch (err) {
			console.error('[GoGame] Engine move failed:', err);
			setMessage('Engine failed to move');
		} finally {
			setThinking(false);
		}
	}, [engineColor, iterations]);

	useEffect(() => {
		if (gameOver || thinking || state.toMove !== engineColor) return;
		// Let ink paint the human move before the search blocks the loop
		const timer = setTimeout(() => {
			void engineMove();
		}, 50);
		return () => clearTimeout(timer);
	}, [state, gameOver, thinking, engineColor, engineMove]);

	useInput((input, key) => {
		if (key.escape || input === 'q') {
			onExit();
			return;
		}

		if (gameOver) {
			if (key.return) {
				game.reset();
				setMessage(null);
			}
			return;
		}

		if (!isHumanTurn || thinking) return;

		if (key.upArrow) setCursor(c => ({ ...c, row: Math.min(size, c.row + 1) }));
		if (key.downArrow) setCursor(c => ({ ...c, row: Math.max(1, c.row - 1) }));
		if (key.leftArrow) setCursor(c => ({ ...c, col: Math.max(0, c.col - 1) }));
		if (key.rightArrow) setCursor(c => ({ ...c, col: Math.min(size - 1, c.col + 1) }));

		if (key.return || input === ' ') {
			const column = indexToColumn(cursor.col);
			if (!column) return;
			const payload: Intersection = { column, row: cursor.row };
			const result = game.applyAction({ type: 'place', payload });
			setMessage(result.valid ? null : result.error ?? 'Invalid move');
		}

		if (input === 'p') {
			game.applyAction({ type: 'pass', payload: null });
			setMessage(`${COLOR_NAMES[humanColor]} passed`);
		}

		if (input === 'r') {
			game.applyAction({ type: 'resign', payload: null });
		}
	});

	const renderRow = (line: string, rowIndex: number) => {
		const row = size - rowIndex;
		return (
			<Box key={row} flexDirection="row">
				<Text dimColor>{String(row).padStart(2, ' ')} </Text>
				{line.split('').map((glyph, col) => {
					const selected = isHumanTurn && cursor.row === row && cursor.col === col;
					const color = glyph === STONE_GLYPHS.b ? 'cyan' : glyph === STONE_GLYPHS.w ? 'magenta' : 'gray';
					return (
						<Text key={col}>
							<Text color={selected ? 'green' : color} inverse={selected} bold={glyph !== EMPTY_GLYPH}>
								{glyph}
							</Text>
							{col < size - 1 ? ' ' : ''}
						</Text>
					);
				})}
			</Box>
		);
	};

	return (
		<Box flexDirection="column" alignItems="flex-start">
			<Box marginBottom={1}>
				<Text bold color="yellow">Go {size}x{size} - you play {COLOR_NAMES[humanColor]}</Text>
			</Box>

			<Box flexDirection="column">
				{state.diagram.map(renderRow)}
				<Text dimColor>   {COLUMNS.slice(0, size).join(' ')}</Text>
			</Box>

			<Box marginTop={1} flexDirection="column">
				<Text>
					Captures B: {state.captures.b}  W: {state.captures.w}  Komi: {state.komi}  Estimate: {formatScore(state.score)}
				</Text>
				{gameOver ? (
					<Text bold color={state.winner === humanColor ? 'green' : 'red'}>
						{state.resigned
							? `${COLOR_NAMES[state.resigned]} resigned`
							: state.winner === 'draw'
								? 'Draw'
								: `${state.winner === 'b' ? 'Black' : 'White'} wins (${formatScore(state.score)})`}
					</Text>
				) : (
					<Text color={isHumanTurn ? 'cyan' : 'magenta'}>
						{thinking ? 'Engine is thinking...' : isHumanTurn ? 'Your turn' : "Engine's turn"}
					</Text>
				)}
				{message && <Text color="yellow">{message}</Text>}
				<Text dimColor>
					{gameOver ? 'Enter to play again, Q to quit' : 'Arrows move, Enter places, P passes, R resigns, Q quits'}
				</Text>
			</Box>
		</Box>
	);
};

export default GoGame;
