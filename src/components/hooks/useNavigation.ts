import { useState, useCallback, useRef } from "react";
import {
	reduce,
	type NavigationDeps,
	type NavigationEvent,
	type NavigationState,
} from "../../lib/navigation.js";

export function useNavigation(
	initialState: NavigationState,
	deps: NavigationDeps,
) {
	// Events apply to the latest state, which may be ahead of the rendered one.
	const stateRef = useRef(initialState);
	const [state, setState] = useState(initialState);

	const dispatch = useCallback(
		(event: NavigationEvent) => {
			stateRef.current = reduce(stateRef.current, event, deps);
			setState(stateRef.current);
		},
		[deps],
	);

	return { state, dispatch };
}
