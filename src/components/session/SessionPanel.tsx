import React from "react";
import clsx from "clsx";
import { Dices, Minus, Plus } from "lucide-react";
import type { SessionStore } from "@/audio/store/sessionStore";
import { sharedStyleCycler, type StyleCycler } from "@/audio/session/stylePrompts";
import {
    BARS_OPTIONS,
    GUIDANCE_WEIGHT_SPEC,
    LOOP_WEIGHT_SPEC,
    MAX_STYLES,
    STYLE_WEIGHT_SPEC,
    TEMPERATURE_SPEC,
    TOP_K_SPEC,
} from "@/audio/params/defaults";
import { useSessionStore } from "@/hooks/useSessionStore";
import { ParamSlider } from "../params/ParamSlider";

interface SessionPanelProps {
    store: SessionStore;
    /** Source for the per-row dice buttons. */
    styleCycler?: StyleCycler;
}

export const SessionPanel: React.FC<SessionPanelProps> = ({ store, styleCycler = sharedStyleCycler }) => {
    const { session } = useSessionStore(store);
    const canAdd = session.styles.length < MAX_STYLES;
    const canRemove = session.styles.length > 1;

    return (
        <div className="flex flex-col gap-4 p-4 bg-neutral-900/50 rounded-lg border border-neutral-800">
            {/* Styles */}
            <div className="flex flex-col gap-2">
                <div className="flex items-center justify-between">
                    <h3 className="text-sm font-bold text-neutral-300 uppercase tracking-wider">
                        Styles &amp; Weights
                    </h3>
                    <button
                        type="button"
                        onClick={store.addStyle}
                        disabled={!canAdd}
                        aria-label="Add style"
                        className="p-1 text-pink-400 disabled:text-neutral-600"
                    >
                        <Plus size={14} />
                    </button>
                </div>

                {session.styles.map((entry, index) => (
                    <div key={entry.id} className="flex flex-col gap-1 p-2 rounded bg-pink-500/10">
                        <div className="flex items-center gap-2">
                            <input
                                type="text"
                                aria-label={`Style ${index + 1}`}
                                placeholder="e.g. acid house, trumpet, lofi"
                                value={entry.text}
                                onChange={(e) => store.updateStyle(entry.id, { text: e.target.value })}
                                className="flex-1 bg-neutral-800 text-xs px-2 py-1 rounded"
                            />
                            <button
                                type="button"
                                aria-label={`Randomize style ${index + 1}`}
                                onClick={() => store.updateStyle(entry.id, { text: styleCycler.next() })}
                                className="text-pink-400"
                            >
                                <Dices size={14} />
                            </button>
                            {canRemove && (
                                <button
                                    type="button"
                                    aria-label={`Remove style ${index + 1}`}
                                    onClick={() => store.removeStyle(entry.id)}
                                    className="text-pink-400"
                                >
                                    <Minus size={14} />
                                </button>
                            )}
                        </div>
                        <ParamSlider
                            spec={STYLE_WEIGHT_SPEC}
                            label={`Style ${index + 1} weight`}
                            value={entry.weight}
                            onChange={(weight) => store.updateStyle(entry.id, { weight })}
                        />
                    </div>
                ))}
            </div>

            <ParamSlider spec={LOOP_WEIGHT_SPEC} value={session.loopWeight} onChange={store.setLoopWeight} />

            <div className="flex items-center gap-2" role="group" aria-label="Bars">
                {BARS_OPTIONS.map((bars) => (
                    <button
                        key={bars}
                        type="button"
                        aria-pressed={session.bars === bars}
                        onClick={() => store.setBars(bars)}
                        className={clsx(
                            "px-3 py-1 rounded text-xs",
                            session.bars === bars ? "bg-pink-500 text-black" : "bg-neutral-700 text-white"
                        )}
                    >
                        {bars} bars
                    </button>
                ))}
            </div>

            <ParamSlider spec={TEMPERATURE_SPEC} value={session.temperature} onChange={store.setTemperature} />
            <ParamSlider spec={TOP_K_SPEC} value={session.topK} onChange={store.setTopK} />
            <ParamSlider
                spec={GUIDANCE_WEIGHT_SPEC}
                value={session.guidanceWeight}
                onChange={store.setGuidanceWeight}
            />
        </div>
    );
};
