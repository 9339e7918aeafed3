import React, { useState, useCallback, useMemo, useRef, useEffect } from 'react';
import { Chart } from 'chart.js/auto';
import type { AlgorithmKey, AlgorithmStats, ArrayType, SettingsErrors, Step, Trace, ViewMode, VisualizerSettings } from './types';
import { ALGORITHMS, ALGORITHM_KEYS, DEFAULT_SETTINGS, LIMITS } from './constants';
import { generateTrace, isAlgorithmKey } from './services/sortingService';
import { createArray, parseSequence } from './services/arrayFactory';
import { compareAlgorithms, describeStep, runningCounts } from './services/traceSummary';
import { EMPTY_ERRORS, effectiveSeed, hasErrors, validateSettings } from './services/configService';
import { usePlayback } from './hooks/usePlayback';
import { ChartIcon, CompareIcon, PauseIcon, PlayIcon, RestartIcon, ShuffleIcon, StepBackIcon, StepForwardIcon, SwapIcon, WriteIcon } from './components/icons';

// --- UI HELPER COMPONENTS ---

const GlassPanel: React.FC<{ children: React.ReactNode; className?: string }> = ({ children, className = '' }) => (
    <div className={`bg-black/40 backdrop-blur-sm border border-purple-500/50 rounded-lg shadow-lg shadow-purple-900/50 ${className}`}>
        {children}
    </div>
);

const Button: React.FC<{ onClick: () => void; children: React.ReactNode; disabled?: boolean; className?: string; title?: string }> = ({ onClick, children, disabled = false, className = '', title }) => (
    <button
        onClick={onClick}
        disabled={disabled}
        title={title}
        className={`relative inline-flex items-center justify-center px-5 py-3 font-game text-sm uppercase tracking-widest text-black bg-cyan-400 border-2 border-cyan-800 shadow-[4px_4px_0px_#0d0d2b] transition-all duration-150 ease-in-out hover:translate-x-[2px] hover:translate-y-[2px] hover:shadow-[2px_2px_0px_#0d0d2b] disabled:bg-gray-600 disabled:text-gray-400 disabled:cursor-not-allowed disabled:transform-none ${className}`}
    >
        {children}
    </button>
);

const Select: React.FC<{ id: string; value: string; onChange: (e: React.ChangeEvent<HTMLSelectElement>) => void; children: React.ReactNode }> = ({ id, value, onChange, children }) => (
    <select id={id} value={value} onChange={onChange} className="w-full bg-gray-900/80 border-2 border-purple-500 rounded p-2 text-white focus:outline-none focus:border-cyan-400 focus:ring-2 focus:ring-cyan-400 transition-colors duration-200">
        {children}
    </select>
);

const Slider: React.FC<{ id: string; min: number; max: number; value: number; onChange: (e: React.ChangeEvent<HTMLInputElement>) => void }> = (props) => (
    <input type="range" className="w-full" {...props} />
);

const ErrorPanel: React.FC<{ title: string; message: string }> = ({ title, message }) => (
    <div className="bg-red-900/70 border border-red-500 p-2 rounded mt-4 text-red-300 text-xs font-mono break-words whitespace-pre-wrap">
        <h4 className="font-bold mb-1 text-red-200">{title}</h4>
        {message}
    </div>
);

// --- VISUALIZATION COMPONENTS ---

type BarRole = 'idle' | 'comparing' | 'swapping' | 'pivot' | 'merging' | 'sorted';

const BAR_COLORS: Record<BarRole, string> = {
    idle: 'bg-fuchsia-500 shadow-[0_0_8px_var(--glow-fuchsia)]',
    comparing: 'bg-yellow-400 shadow-[0_0_8px_var(--glow-yellow)]',
    swapping: 'bg-cyan-400 shadow-[0_0_8px_var(--glow-cyan)]',
    pivot: 'bg-orange-400',
    merging: 'bg-blue-400',
    sorted: 'bg-green-400 shadow-[0_0_8px_var(--glow-green)]',
};

const Bar: React.FC<{ value: number; maxValue: number; role: BarRole }> = React.memo(({ value, maxValue, role }) => {
    const height = `${maxValue > 0 ? Math.max(0, value / maxValue) * 100 : 0}%`;
    return <div style={{ height }} title={String(value)} className={`w-full rounded-t-sm transition-colors duration-100 ease-linear ${BAR_COLORS[role]}`} />;
});

const ACTIVE_ROLE: Record<Step['kind'], BarRole> = {
    compare: 'comparing',
    swap: 'swapping',
    'partition-pivot': 'pivot',
    merge: 'merging',
    done: 'sorted',
};

const roleOf = (step: Step, index: number): BarRole => {
    if (step.indices.includes(index)) return ACTIVE_ROLE[step.kind];
    return step.settled.includes(index) ? 'sorted' : 'idle';
};

const ArenaDisplay: React.FC<{ step: Step }> = ({ step }) => {
    const maxValue = step.array.reduce((max, value) => Math.max(max, value), 0);
    return (
        <div className="h-64 w-full flex items-end justify-start gap-[1px] border-2 border-fuchsia-500/50 rounded-md p-1 bg-black bg-opacity-70 shadow-[0_0_15px_rgba(255,0,255,0.3)]">
            {step.array.map((value, index) => (
                <Bar key={step.origins[index]} value={value} maxValue={maxValue} role={roleOf(step, index)} />
            ))}
        </div>
    );
};

interface ArenaProps {
    trace: Trace;
    delay: number;
}

const Arena: React.FC<ArenaProps> = ({ trace, delay }) => {
    const { state, step, play, pause, stepForward, stepBackward, seek, restart } = usePlayback(trace, delay);
    const counts = useMemo(() => runningCounts(trace), [trace]);
    const comparisons = counts.comparisons[state.cursor] ?? 0;
    const swaps = counts.swaps[state.cursor] ?? 0;

    useEffect(() => {
        const handleKeyDown = (event: KeyboardEvent) => {
            if (event.target instanceof HTMLElement && ['INPUT', 'SELECT', 'TEXTAREA'].includes(event.target.tagName)) {
                return;
            }
            switch (event.key) {
                case ' ':
                    event.preventDefault();
                    if (state.status === 'playing') pause();
                    else play();
                    break;
                case 'ArrowRight':
                    stepForward();
                    break;
                case 'ArrowLeft':
                    stepBackward();
                    break;
                case 'r':
                case 'R':
                    restart();
                    break;
                default:
                    break;
            }
        };
        document.addEventListener('keydown', handleKeyDown);
        return () => {
            document.removeEventListener('keydown', handleKeyDown);
        };
    }, [state.status, play, pause, stepForward, stepBackward, restart]);

    return (
        <GlassPanel className="p-4 flex flex-col">
            <h3 className="text-xl font-game text-yellow-300 mb-4 text-center truncate">{ALGORITHMS[trace.algorithm].name}</h3>
            {step && <ArenaDisplay step={step} />}
            <p className="mt-2 text-sm font-mono text-green-300 min-h-[1.5rem]">{step ? describeStep(step) : ''}</p>
            <input
                type="range"
                aria-label="Step"
                min={0}
                max={Math.max(0, state.length - 1)}
                value={state.cursor}
                onChange={(e) => seek(parseInt(e.target.value, 10))}
                className="w-full mt-2"
            />
            <div className="mt-4 flex flex-wrap justify-center gap-3">
                {state.status === 'playing' ? (
                    <Button onClick={pause} title="Pause (Spacebar)"><PauseIcon />Pause</Button>
                ) : (
                    <Button onClick={play} disabled={state.status === 'finished' || state.status === 'idle'} title="Play (Spacebar)"><PlayIcon />Play</Button>
                )}
                <Button onClick={stepBackward} disabled={state.cursor === 0} title="Step back (Left arrow)"><StepBackIcon />Back</Button>
                <Button onClick={stepForward} disabled={state.status === 'finished'} title="Step forward (Right arrow)"><StepForwardIcon />Next</Button>
                <Button onClick={restart} title="Back to the first step (R)"><RestartIcon />Restart</Button>
            </div>
            <div className="mt-4 text-sm font-mono grid grid-cols-2 md:grid-cols-4 gap-x-4 gap-y-2">
                <p className="truncate">Step {Math.min(state.cursor + 1, state.length)} / {state.length}</p>
                <p className="truncate"><CompareIcon />{comparisons.toLocaleString()} / {trace.totalComparisons.toLocaleString()}</p>
                <p className="truncate"><SwapIcon />{swaps.toLocaleString()} / {trace.totalSwaps.toLocaleString()}</p>
                <p className="truncate"><WriteIcon />{trace.totalWrites.toLocaleString()}</p>
            </div>
        </GlassPanel>
    );
};

const ResultsChart: React.FC<{ results: AlgorithmStats[] }> = ({ results }) => {
    const chartRef = useRef<HTMLCanvasElement>(null);
    const chartInstance = useRef<Chart | null>(null);

    useEffect(() => {
        if (chartRef.current) {
            if (chartInstance.current) {
                chartInstance.current.destroy();
            }
            const ctx = chartRef.current.getContext('2d');
            if (ctx) {
                Chart.defaults.font.family = "'Roboto Mono', monospace";
                chartInstance.current = new Chart(ctx, {
                    type: 'bar',
                    data: {
                        labels: results.map(r => r.name),
                        datasets: [
                            {
                                label: 'Comparisons',
                                data: results.map(r => r.comparisons),
                                backgroundColor: 'rgba(255, 255, 0, 0.7)',
                                borderColor: 'rgba(255, 255, 0, 1)',
                                borderWidth: 1,
                            },
                            {
                                label: 'Swaps',
                                data: results.map(r => r.swaps),
                                backgroundColor: 'rgba(0, 255, 255, 0.7)',
                                borderColor: 'rgba(0, 255, 255, 1)',
                                borderWidth: 1,
                            },
                            {
                                label: 'Writes',
                                data: results.map(r => r.writes),
                                backgroundColor: 'rgba(0, 255, 0, 0.7)',
                                borderColor: 'rgba(0, 255, 0, 1)',
                                borderWidth: 1,
                            },
                        ],
                    },
                    options: {
                        maintainAspectRatio: false,
                        scales: {
                            y: {
                                beginAtZero: true,
                                title: { display: true, text: 'Operations', color: '#e0e0e0', font: { size: 14 } },
                                ticks: { color: '#e0e0e0' },
                                grid: { color: 'rgba(255, 255, 255, 0.1)' },
                            },
                            x: {
                                ticks: { color: '#e0e0e0', font: { size: 10 } },
                                grid: { color: 'rgba(255, 255, 255, 0.1)' },
                            },
                        },
                        plugins: {
                            legend: { labels: { color: '#e0e0e0', font: { size: 12 } } },
                            tooltip: { mode: 'index', intersect: false },
                        },
                    },
                });
            }
        }
        return () => {
            if (chartInstance.current) {
                chartInstance.current.destroy();
                chartInstance.current = null;
            }
        };
    }, [results]);

    return <canvas ref={chartRef}></canvas>;
};

const ComparisonPanel: React.FC<{ input: readonly number[]; seed?: number }> = ({ input, seed }) => {
    const outcome = useMemo(() => {
        try {
            return { results: compareAlgorithms(input, seed), error: null };
        } catch (e) {
            console.error('Failed to compare algorithms:', e);
            return { results: [], error: e instanceof Error ? e.message : 'An unknown error occurred.' };
        }
    }, [input, seed]);

    return (
        <GlassPanel className="p-6">
            <h2 className="text-2xl font-game text-cyan-300 mb-4 text-center">Operation Counts on the Same Input</h2>
            <div className="relative h-96 w-full mx-auto">
                <ResultsChart results={outcome.results} />
            </div>
            <table className="w-full mt-6 text-sm font-mono">
                <thead>
                    <tr className="text-yellow-300 text-left">
                        <th>Algorithm</th><th>Comparisons</th><th>Swaps</th><th>Writes</th><th>Steps</th><th>Stable</th>
                    </tr>
                </thead>
                <tbody>
                    {outcome.results.map(r => (
                        <tr key={r.algorithm}>
                            <td>{r.name}</td>
                            <td>{r.comparisons.toLocaleString()}</td>
                            <td>{r.swaps.toLocaleString()}</td>
                            <td>{r.writes.toLocaleString()}</td>
                            <td>{r.steps.toLocaleString()}</td>
                            <td>{ALGORITHMS[r.algorithm].stable ? 'yes' : 'no'}</td>
                        </tr>
                    ))}
                </tbody>
            </table>
            {outcome.error && <ErrorPanel title="Comparison Failed" message={outcome.error} />}
        </GlassPanel>
    );
};

// --- APP COMPONENT ---

const isArrayType = (value: string): value is ArrayType => value === 'random' || value === 'nearlySorted' || value === 'reversed';

const App: React.FC = () => {
    const [settings, setSettings] = useState<VisualizerSettings>(DEFAULT_SETTINGS);
    const [validationErrors, setValidationErrors] = useState<SettingsErrors>(EMPTY_ERRORS);
    const [mode, setMode] = useState<ViewMode>('visualize');
    const [array, setArray] = useState<number[]>(() => createArray({ size: DEFAULT_SETTINGS.arraySize, type: DEFAULT_SETTINGS.arrayType }));
    const [customInput, setCustomInput] = useState('');
    const [inputError, setInputError] = useState<string | null>(null);

    const applySettings = useCallback((next: VisualizerSettings) => {
        const errors = validateSettings(next);
        setValidationErrors(errors);
        setSettings(next);
        return !hasErrors(errors);
    }, []);

    const handleRandomize = useCallback((next: VisualizerSettings = settings) => {
        try {
            setArray(createArray({ size: next.arraySize, type: next.arrayType, seed: effectiveSeed(next) }));
            setInputError(null);
        } catch (e) {
            console.error('Failed to create array:', e);
            setInputError(e instanceof Error ? e.message : 'An unknown error occurred.');
        }
    }, [settings]);

    const handleUseCustomInput = () => {
        try {
            const values = parseSequence(customInput);
            if (values.length > LIMITS.maxArraySize) {
                setInputError(`At most ${LIMITS.maxArraySize} values are supported.`);
                return;
            }
            setArray(values);
            setInputError(null);
        } catch (e) {
            console.error('Failed to parse custom input:', e);
            setInputError(e instanceof Error ? e.message : 'An unknown error occurred.');
        }
    };

    const seed = effectiveSeed(settings);

    const generated = useMemo(() => {
        try {
            return { trace: generateTrace(array, settings.algorithm, seed), error: null };
        } catch (e) {
            console.error(`Error in ${settings.algorithm} sort:`, e);
            return { trace: null, error: e instanceof Error ? e.message : 'An unknown error occurred.' };
        }
    }, [array, settings.algorithm, seed]);

    const handleSelectChange = (e: React.ChangeEvent<HTMLSelectElement>) => {
        const { id, value } = e.target;
        if (id === 'algorithm' && isAlgorithmKey(value)) {
            applySettings({ ...settings, algorithm: value });
        } else if (id === 'arrayType' && isArrayType(value)) {
            const next = { ...settings, arrayType: value };
            if (applySettings(next)) handleRandomize(next);
        }
    };

    const handleSliderChange = (e: React.ChangeEvent<HTMLInputElement>) => {
        const { id, value } = e.target;
        const numValue = parseInt(value, 10);
        if (id === 'arraySize') {
            const next = { ...settings, arraySize: numValue };
            if (applySettings(next)) handleRandomize(next);
        } else if (id === 'delay') {
            applySettings({ ...settings, delay: numValue });
        }
    };

    const handleSeedChange = (e: React.ChangeEvent<HTMLInputElement>) => {
        const raw = e.target.value.trim();
        applySettings({ ...settings, seed: raw === '' ? undefined : Number(raw) });
    };

    const delayIsValid = validationErrors.delay === '';

    return (
        <div className="max-w-7xl mx-auto">
            <header className="text-center my-6">
                <h1 className="text-4xl sm:text-5xl font-game neon-text">Sort Replay</h1>
                <p className="text-fuchsia-300 text-sm sm:text-base">Step through classic sorting algorithms</p>
            </header>
            <main className="space-y-8">
                <GlassPanel className="p-6">
                    <div className="mb-6 flex justify-center border-b-2 border-purple-500/30">
                        <button onClick={() => setMode('visualize')} title="Replay one algorithm step by step" className={`font-game px-6 py-3 text-sm transition-colors flex items-center ${mode === 'visualize' ? 'text-cyan-300 border-b-2 border-cyan-300' : 'text-gray-400 hover:text-white'}`}>
                            <PlayIcon /> Visualize
                        </button>
                        <button onClick={() => setMode('compare')} title="Compare operation counts of every algorithm" className={`font-game px-6 py-3 text-sm transition-colors flex items-center ${mode === 'compare' ? 'text-cyan-300 border-b-2 border-cyan-300' : 'text-gray-400 hover:text-white'}`}>
                            <ChartIcon /> Compare
                        </button>
                    </div>

                    <div className="grid grid-cols-1 md:grid-cols-3 gap-6">
                        <div>
                            <label htmlFor="algorithm" className="block mb-2 font-bold text-yellow-300">Algorithm</label>
                            <Select id="algorithm" value={settings.algorithm} onChange={handleSelectChange}>
                                {ALGORITHM_KEYS.map((key: AlgorithmKey) => (
                                    <option key={key} value={key}>{ALGORITHMS[key].name}</option>
                                ))}
                            </Select>
                            <p className="text-xs text-gray-400 mt-2">{ALGORITHMS[settings.algorithm].description} {ALGORITHMS[settings.algorithm].complexity}, {ALGORITHMS[settings.algorithm].stable ? 'stable' : 'not stable'}.</p>
                        </div>
                        <div>
                            <label htmlFor="arrayType" className="block mb-2 font-bold">Array Type</label>
                            <Select id="arrayType" value={settings.arrayType} onChange={handleSelectChange}>
                                <option value="random">Random</option>
                                <option value="nearlySorted">Nearly Sorted</option>
                                <option value="reversed">Reversed</option>
                            </Select>
                        </div>
                        <div>
                            <label htmlFor="seed" className="block mb-2 font-bold">Seed (empty = random)</label>
                            <input id="seed" type="number" min={0} value={settings.seed ?? ''} onChange={handleSeedChange} className="w-full bg-gray-900/80 border-2 border-purple-500 rounded p-2 text-white" />
                            {validationErrors.seed && <p className="text-red-400 text-xs mt-1">{validationErrors.seed}</p>}
                        </div>
                        <div>
                            <label htmlFor="arraySize" className="block mb-2 font-bold">Array Size: {settings.arraySize}</label>
                            <Slider id="arraySize" min={LIMITS.minArraySize} max={LIMITS.maxArraySize} value={settings.arraySize} onChange={handleSliderChange} />
                            {validationErrors.arraySize && <p className="text-red-400 text-xs mt-1">{validationErrors.arraySize}</p>}
                        </div>
                        <div>
                            <label htmlFor="delay" className="block mb-2 font-bold">Speed (Delay): {settings.delay}ms</label>
                            <Slider id="delay" min={LIMITS.minDelay} max={LIMITS.maxDelay} value={settings.delay} onChange={handleSliderChange} />
                            {validationErrors.delay && <p className="text-red-400 text-xs mt-1">{validationErrors.delay}</p>}
                        </div>
                        <div className="flex items-end">
                            <Button onClick={() => handleRandomize()} disabled={hasErrors(validationErrors)} title="Generate a new input array"><ShuffleIcon />Randomize</Button>
                        </div>
                    </div>

                    <div className="mt-6 flex flex-col md:flex-row gap-4 items-start">
                        <textarea
                            value={customInput}
                            onChange={(e) => setCustomInput(e.target.value)}
                            placeholder="Custom input, e.g. 5, 3, 8, 1"
                            className="flex-grow h-16 bg-gray-900/80 border-2 border-purple-500 rounded p-2 text-sm font-mono text-white focus:outline-none focus:border-cyan-400 resize-none"
                            spellCheck="false"
                        />
                        <Button onClick={handleUseCustomInput} disabled={customInput.trim() === ''}>Use Input</Button>
                    </div>
                    {inputError && <ErrorPanel title="Invalid Input" message={inputError} />}
                </GlassPanel>

                {mode === 'visualize' ? (
                    <>
                        {generated.trace && <Arena trace={generated.trace} delay={delayIsValid ? settings.delay : DEFAULT_SETTINGS.delay} />}
                        {generated.error && <ErrorPanel title="Execution Failed" message={generated.error} />}
                    </>
                ) : (
                    <ComparisonPanel input={array} seed={seed} />
                )}
            </main>
        </div>
    );
};

export default App;
