import React, { useState } from "react";
import clsx from "clsx";
import { ChevronDown } from "lucide-react";
import type { SessionStore } from "@/audio/store/sessionStore";
import { isAssetsAvailable } from "@/audio/steering/steeringState";
import { isPositiveInteger } from "@/audio/params/ranges";
import { CENTROID_INTENSITY_SPEC, MEAN_SPEC } from "@/audio/params/defaults";
import { useSessionStore } from "@/hooks/useSessionStore";
import { ParamSlider } from "../params/ParamSlider";
import { ParamToggle } from "../params/ParamToggle";

interface SteeringPanelProps {
    store: SessionStore;
    /** Start expanded. */
    defaultOpen?: boolean;
}

/**
 * Finetune steering: mean slider, compact centroid mixer (pick one + intensity),
 * and optionally one slider per centroid. Hidden until the backend reports assets.
 */
export const SteeringPanel: React.FC<SteeringPanelProps> = ({ store, defaultOpen = false }) => {
    const { steering } = useSessionStore(store);
    const [open, setOpen] = useState(defaultOpen);

    if (!isAssetsAvailable(steering)) return null;

    const count = isPositiveInteger(steering.centroidCount) ? steering.centroidCount : 0;
    const indices = Array.from({ length: count }, (_, i) => i);

    return (
        <section className="flex flex-col gap-3 p-4 bg-neutral-900/50 rounded-lg border border-neutral-800">
            <button
                type="button"
                aria-expanded={open}
                onClick={() => setOpen(!open)}
                className="flex items-center gap-2 text-sm font-bold text-neutral-300 uppercase tracking-wider"
            >
                Steering (Finetune)
                <ChevronDown
                    size={14}
                    className={clsx("transition-transform", open && "rotate-180")}
                />
            </button>

            {open && (
                <div className="flex flex-col gap-3">
                    {steering.meanAvailable && (
                        <ParamSlider spec={MEAN_SPEC} value={steering.mean} onChange={store.setMean} />
                    )}

                    {count > 0 && (
                        <>
                            <div className="flex flex-wrap gap-1" role="group" aria-label="Centroids">
                                {indices.map((idx) => (
                                    <button
                                        key={idx}
                                        type="button"
                                        aria-pressed={steering.compactCentroidIndex === idx}
                                        onClick={() => store.selectCompactCentroid(idx)}
                                        className={clsx(
                                            "px-2 py-1 rounded text-xs font-mono",
                                            steering.compactCentroidIndex === idx
                                                ? "bg-pink-500 text-black"
                                                : "bg-neutral-700 text-white"
                                        )}
                                    >
                                        C{idx + 1}
                                    </button>
                                ))}
                            </div>

                            <ParamSlider
                                spec={CENTROID_INTENSITY_SPEC}
                                value={steering.compactCentroidIntensity}
                                onChange={store.adjustCompactIntensity}
                            />

                            <ParamToggle
                                label="Show all centroid sliders"
                                value={steering.showAdvancedCentroids}
                                onChange={store.setShowAdvancedCentroids}
                            />

                            {steering.showAdvancedCentroids &&
                                indices.map((idx) => (
                                    <ParamSlider
                                        key={idx}
                                        spec={CENTROID_INTENSITY_SPEC}
                                        label={`Centroid ${idx + 1}`}
                                        value={steering.centroidWeights[idx] ?? 0}
                                        onChange={(v) => store.setCentroidWeight(idx, v)}
                                    />
                                ))}
                        </>
                    )}
                </div>
            )}
        </section>
    );
};
