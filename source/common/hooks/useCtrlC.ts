import {useRef, useCallback, useEffect} from 'react';
import {useApp} from 'ink';

type Options = {
	/** First press: the caller resets its state and shows a hint */
	onFirstPress: () => void;
	/** The hint timed out without a second press */
	onStatusClear: () => void;
	/** Second press, right before the app exits */
	onExit?: () => void;
	timeout?: number;
};

/**
 * Two-step Ctrl+C. A second press while the first is still armed exits.
 */
export function useCtrlC({
	onFirstPress,
	onStatusClear,
	onExit,
	timeout = 2000,
}: Options) {
	const {exit} = useApp();
	const disarmTimer = useRef<ReturnType<typeof setTimeout> | null>(null);

	const disarm = useCallback(() => {
		if (disarmTimer.current) {
			clearTimeout(disarmTimer.current);
			disarmTimer.current = null;
		}
	}, []);

	useEffect(() => disarm, [disarm]);

	const handleCtrlC = useCallback(() => {
		if (disarmTimer.current) {
			disarm();
			onExit?.();
			exit();
			return;
		}

		onFirstPress();
		disarmTimer.current = setTimeout(() => {
			disarmTimer.current = null;
			onStatusClear();
		}, timeout);
	}, [disarm, exit, onFirstPress, onStatusClear, onExit, timeout]);

	return {handleCtrlC};
}
