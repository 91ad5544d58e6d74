import React from 'react';

export interface Option<T extends string> {
  label: string;
  value: T;
}

interface Props<T extends string> extends Omit<React.SelectHTMLAttributes<HTMLSelectElement>, 'value' | 'onChange'> {
  label: string;
  value: T;
  options: readonly Option<T>[];
  onValue: (v: T) => void;
}

export default function Select<T extends string>({ label, value, options, onValue, ...rest }: Props<T>) {
  return (
    <label className="block">
      <span className="block text-sm font-medium text-gray-700 mb-1">{label}</span>
      <select
        value={value}
        onChange={e => {
          const picked = options.find(o => o.value === e.target.value);
          if (picked) onValue(picked.value);
        }}
        className="w-full rounded-xl border px-3 py-2 outline-none focus:ring-2 focus:ring-blue-500 border-gray-300 bg-white"
        {...rest}
      >
        {options.map(o => (
          <option key={o.value} value={o.value}>{o.label}</option>
        ))}
      </select>
    </label>
  );
}
