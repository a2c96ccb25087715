import React from "react";
import type { ParamSpec } from "@/audio/params/types";
import { getFormatter, clamp, snapToStep } from "@/audio/params/ranges";

interface ParamSliderProps {
    spec: ParamSpec;
    value: number;
    onChange: (value: number) => void;
    /** Overrides spec.label (e.g. "Centroid 3"). */
    label?: string;
}

export const ParamSlider: React.FC<ParamSliderProps> = ({ spec, value, onChange, label }) => {
    const formatter = spec.format || getFormatter(spec.unit);
    const clampedValue = clamp(value, spec.min, spec.max);
    const text = label ?? spec.label;

    const handleChange = (e: React.ChangeEvent<HTMLInputElement>) => {
        const raw = parseFloat(e.target.value);
        if (Number.isNaN(raw)) return;
        onChange(snapToStep(raw, spec.min, spec.max, spec.step));
    };

    return (
        <div className="flex flex-col gap-1 w-full">
            <div className="flex justify-between text-xs uppercase tracking-wider text-neutral-400">
                <span>{text}</span>
                <span className="text-pink-400 font-mono">{formatter(clampedValue)}</span>
            </div>
            <input
                type="range"
                aria-label={text}
                min={spec.min}
                max={spec.max}
                step={spec.step}
                value={clampedValue}
                onChange={handleChange}
                className="w-full accent-pink-500 h-2 bg-neutral-800 rounded-lg appearance-none cursor-pointer"
            />
        </div>
    );
};
