import { useCallback, useEffect, useRef, useSyncExternalStore } from 'react';
import type { Trace } from '../types';
import { PlaybackController } from '../services/playbackController';

/**
 * Binds a PlaybackController to React. The controller is loaded with `trace` whenever it changes,
 * and ticked from requestAnimationFrame while it is playing.
 */
export const usePlayback = (trace: Trace | null, delayMs: number) => {
    const controllerRef = useRef<PlaybackController | null>(null);
    if (controllerRef.current === null) {
        controllerRef.current = new PlaybackController(delayMs);
    }
    const controller = controllerRef.current;

    const subscribe = useCallback((onChange: () => void) => controller.subscribe(onChange), [controller]);
    const getSnapshot = useCallback(() => controller.getState(), [controller]);
    useSyncExternalStore(subscribe, getSnapshot);
    // The load effect runs after this render; until then show `trace` as freshly loaded.
    const { state, step } = controller.viewOf(trace);

    useEffect(() => {
        if (trace) {
            controller.load(trace);
        } else {
            controller.unload();
        }
    }, [controller, trace]);

    useEffect(() => {
        controller.setDelay(delayMs);
    }, [controller, delayMs]);

    useEffect(() => {
        if (state.status !== 'playing') return;
        let active = true;
        let frame = 0;

        const loop = (now: number) => {
            if (!active) return;
            controller.tick(now);
            frame = requestAnimationFrame(loop);
        };
        frame = requestAnimationFrame(loop);

        return () => {
            active = false;
            cancelAnimationFrame(frame);
        };
    }, [controller, state.status]);

    return {
        state,
        step,
        play: () => controller.play(),
        pause: () => controller.pause(),
        stepForward: () => controller.stepForward(),
        stepBackward: () => controller.stepBackward(),
        seek: (index: number) => controller.seek(index),
        restart: () => controller.restart(),
    };
};
